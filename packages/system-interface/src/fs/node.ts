import fsSync from "node:fs";
import fsAsync from "node:fs/promises";
import { isNotFoundError, promisifyNoErr } from "./helper";
import type { FileSystem } from "./interfaces";

const exists = promisifyNoErr(fsSync.exists);

export class NodeFileSystem implements FileSystem {
    readFileAsString(path: string): Promise<string> {
        return fsAsync.readFile(path, "utf-8");
    }

    writeStringToFile(path: string, content: string): Promise<void> {
        return fsAsync.writeFile(path, content, "utf-8");
    }

    pathExists(path: string): Promise<boolean> {
        return exists(path);
    }

    async createDirectory(
        path: string,
        options?: { recursive?: boolean },
    ): Promise<void> {
        await fsAsync.mkdir(path, { recursive: options?.recursive ?? false });
    }

    readDirectory(path: string): Promise<string[]> {
        return fsAsync.readdir(path);
    }

    remove(path: string, options?: { recursive?: boolean }): Promise<void> {
        return fsAsync.rm(path, { recursive: options?.recursive ?? false });
    }

    createSymbolicLink(target: string, path: string): Promise<void> {
        return fsAsync.symlink(target, path);
    }

    async isDirectory(path: string): Promise<boolean> {
        const stat = await fsAsync.stat(path);
        return stat.isDirectory();
    }

    async isSymbolicLink(path: string): Promise<boolean> {
        try {
            const stat = await fsAsync.lstat(path);
            return stat.isSymbolicLink();
        } catch (e) {
            if (isNotFoundError(e)) {
                return false;
            }
            throw e;
        }
    }
}

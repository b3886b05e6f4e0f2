import { resolve } from "node:path";
import type { IFs, Volume } from "memfs";
import type { Process } from "../proc";
import { isNotFoundError, promisifyNoErr } from "./helper";
import type { FileSystem } from "./interfaces";

export class VirtualFileSystem implements FileSystem {
    private fs: IFs["promises"];
    private exists: (path: string) => Promise<boolean>;

    constructor(
        mem: {
            fs: IFs;
            vol: Volume;
        },
        private proc: Process,
    ) {
        this.fs = mem.fs.promises;
        this.exists = promisifyNoErr(mem.fs.exists);
    }

    private resolve(path: string): string {
        return resolve(this.proc.currentDir(), path);
    }

    async readFileAsString(path: string): Promise<string> {
        const data = await this.fs.readFile(this.resolve(path), {
            encoding: "utf8",
        });
        return data.toString();
    }

    writeStringToFile(path: string, content: string): Promise<void> {
        return this.fs.writeFile(this.resolve(path), content, {
            encoding: "utf8",
        });
    }

    pathExists(path: string): Promise<boolean> {
        return this.exists(this.resolve(path));
    }

    async createDirectory(
        path: string,
        options?: { recursive?: boolean },
    ): Promise<void> {
        await this.fs.mkdir(this.resolve(path), {
            recursive: options?.recursive ?? false,
        });
    }

    async readDirectory(path: string): Promise<string[]> {
        const entries = await this.fs.readdir(this.resolve(path));

        return entries.map((entry) => {
            if (typeof entry === "string") {
                return entry;
            }
            if (Buffer.isBuffer(entry)) {
                return entry.toString("utf8");
            }
            return String(entry.name);
        });
    }

    async remove(
        path: string,
        options?: { recursive?: boolean },
    ): Promise<void> {
        // memfs resolves the link before removing it
        if (await this.isSymbolicLink(path)) {
            return this.fs.unlink(this.resolve(path));
        }
        return this.fs.rm(this.resolve(path), {
            recursive: options?.recursive ?? false,
        });
    }

    createSymbolicLink(target: string, path: string): Promise<void> {
        return this.fs.symlink(target, this.resolve(path));
    }

    async isDirectory(path: string): Promise<boolean> {
        const stat = await this.fs.stat(this.resolve(path));
        return stat.isDirectory();
    }

    async isSymbolicLink(path: string): Promise<boolean> {
        try {
            const stat = await this.fs.lstat(this.resolve(path));
            return stat.isSymbolicLink();
        } catch (e) {
            if (isNotFoundError(e)) {
                return false;
            }
            throw e;
        }
    }
}

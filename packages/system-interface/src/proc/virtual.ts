import { resolve } from "node:path";
import type { Process, ProcessEnv } from "./interfaces";

export type VirtualProcessOptions = {
    cwd?: string;
    args?: string[];
    env?: ProcessEnv;
    tempDir?: string;
    /**
     * Decides whether `setCurrentDir` may enter a directory. Every
     * directory is accepted when omitted.
     */
    isDirectory?: (dir: string) => boolean;
};

export class VirtualProcess implements Process {
    private cwd: string;
    private readonly argsValues: string[];
    private readonly envVars: ProcessEnv;
    private readonly tmp: string;
    private readonly isDirectory: (dir: string) => boolean;

    constructor(options: VirtualProcessOptions = {}) {
        this.cwd = options.cwd ?? "/";
        this.argsValues = options.args ?? [];
        this.envVars = options.env ?? {};
        this.tmp = options.tempDir ?? "/tmp";
        this.isDirectory = options.isDirectory ?? (() => true);
    }

    static async create(
        options: VirtualProcessOptions = {},
    ): Promise<VirtualProcess> {
        return new VirtualProcess(options);
    }

    currentDir(): string {
        return this.cwd;
    }

    setCurrentDir(dir: string): void {
        const target = resolve(this.cwd, dir);
        if (!this.isDirectory(target)) {
            throw new NoSuchDirectoryError(target);
        }
        this.cwd = target;
    }

    args(): string[] {
        return this.argsValues;
    }

    env(): ProcessEnv {
        return this.envVars;
    }

    tempDir(): string {
        return this.tmp;
    }
}

export class NoSuchDirectoryError extends Error {
    public readonly code = "ENOENT";

    constructor(public readonly dir: string) {
        super(`ENOENT: no such file or directory, chdir '${dir}'`);
        super.name = this.constructor.name;
    }
}

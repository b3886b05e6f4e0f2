import { memfs } from "memfs";
import { VirtualCommandRunner } from "../cmd";
import { VirtualFileSystem } from "../fs";
import { VirtualProcess, type VirtualProcessOptions } from "../proc";
import type { System } from "./interfaces";

export type VirtualSystemOptions = Omit<VirtualProcessOptions, "isDirectory">;

/**
 * A system backed by an in-memory volume and a recording command runner.
 * The volume starts with the current and temp directories in place.
 */
export class VirtualSystem implements System {
    constructor(
        public fs: VirtualFileSystem,
        public proc: VirtualProcess,
        public cmd: VirtualCommandRunner,
    ) {}

    public static async create(
        options: VirtualSystemOptions = {},
    ): Promise<VirtualSystem> {
        const mem = memfs();
        const process = await VirtualProcess.create({
            ...options,
            isDirectory: (dir) =>
                mem.vol.existsSync(dir) && mem.vol.statSync(dir).isDirectory(),
        });

        mem.vol.mkdirSync(process.currentDir(), { recursive: true });
        mem.vol.mkdirSync(process.tempDir(), { recursive: true });

        return new VirtualSystem(
            new VirtualFileSystem(mem, process),
            process,
            new VirtualCommandRunner(process),
        );
    }
}

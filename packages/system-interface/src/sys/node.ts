import { NodeCommandRunner } from "../cmd";
import { NodeFileSystem } from "../fs";
import { NodeProcess } from "../proc";
import type { System } from "./interfaces";

export class NodeSystem implements System {
    private constructor(
        public fs: NodeFileSystem,
        public proc: NodeProcess,
        public cmd: NodeCommandRunner,
    ) {}

    static async create(): Promise<NodeSystem> {
        const proc = new NodeProcess();
        return new NodeSystem(
            new NodeFileSystem(),
            proc,
            new NodeCommandRunner(proc),
        );
    }
}

import { spawn } from "node:child_process";
import os from "node:os";
import type { Process } from "../proc";
import {
    type CommandOptions,
    type CommandResult,
    type CommandRunner,
    CommandSpawnError,
} from "./interfaces";

// Shell convention for a child terminated by a signal.
const SIGNAL_EXIT_BASE = 128;

export class NodeCommandRunner implements CommandRunner {
    constructor(private readonly proc: Process) {}

    run(
        command: string,
        args: readonly string[],
        options: CommandOptions = {},
    ): Promise<CommandResult> {
        const stdio = options.stdio ?? "inherit";

        return new Promise((resolve, reject) => {
            const child = spawn(command, args, {
                cwd: options.cwd ?? this.proc.currentDir(),
                env: options.env ?? this.proc.env(),
                stdio: ["inherit", stdio, stdio],
            });

            let stdout = "";
            let stderr = "";
            child.stdout?.setEncoding("utf-8");
            child.stderr?.setEncoding("utf-8");
            child.stdout?.on("data", (chunk: string) => {
                stdout += chunk;
            });
            child.stderr?.on("data", (chunk: string) => {
                stderr += chunk;
            });

            child.once("error", (err) => {
                reject(new CommandSpawnError(command, { cause: err }));
            });

            child.once("close", (code, signal) => {
                const exitCode =
                    code ??
                    SIGNAL_EXIT_BASE +
                        (signal ? os.constants.signals[signal] : 0);
                resolve({ exitCode, stdout, stderr });
            });
        });
    }
}

import type { Process, ProcessEnv } from "../proc";
import {
    type CommandOptions,
    type CommandResult,
    type CommandRunner,
    CommandSpawnError,
    type StdioMode,
} from "./interfaces";

export type CommandInvocation = {
    command: string;
    args: string[];
    cwd: string;
    env: ProcessEnv;
    stdio: StdioMode;
};

/**
 * Fakes the effect of a command. Returning a number is shorthand for an
 * exit code with empty output.
 */
export type CommandHandler = (
    invocation: CommandInvocation,
) => number | Partial<CommandResult> | Promise<number | Partial<CommandResult>>;

/**
 * In-process stand-in for a command runner. Every invocation is recorded;
 * commands without a handler exit with 0, commands marked missing fail to
 * start.
 */
export class VirtualCommandRunner implements CommandRunner {
    public readonly invocations: CommandInvocation[] = [];
    private readonly handlers = new Map<string, CommandHandler>();
    private readonly missing = new Set<string>();

    constructor(private readonly proc: Process) {}

    on(command: string, handler: CommandHandler): this {
        this.handlers.set(command, handler);
        this.missing.delete(command);
        return this;
    }

    markMissing(command: string): this {
        this.missing.add(command);
        this.handlers.delete(command);
        return this;
    }

    async run(
        command: string,
        args: readonly string[],
        options: CommandOptions = {},
    ): Promise<CommandResult> {
        const invocation: CommandInvocation = {
            command,
            args: [...args],
            cwd: options.cwd ?? this.proc.currentDir(),
            env: { ...(options.env ?? this.proc.env()) },
            stdio: options.stdio ?? "inherit",
        };
        this.invocations.push(invocation);

        if (this.missing.has(command)) {
            throw new CommandSpawnError(command);
        }

        const handler = this.handlers.get(command);
        if (!handler) {
            return { exitCode: 0, stdout: "", stderr: "" };
        }

        const outcome = await handler(invocation);
        if (typeof outcome === "number") {
            return { exitCode: outcome, stdout: "", stderr: "" };
        }
        return {
            exitCode: outcome.exitCode ?? 0,
            stdout: outcome.stdout ?? "",
            stderr: outcome.stderr ?? "",
        };
    }
}

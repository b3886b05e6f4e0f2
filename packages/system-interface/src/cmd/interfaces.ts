import type { ProcessEnv } from "../proc";

export type StdioMode = "inherit" | "ignore" | "pipe";

export type CommandOptions = {
    /** Working directory of the child, defaults to the runner's current one. */
    cwd?: string;
    /** Complete environment of the child, defaults to the current one. */
    env?: ProcessEnv;
    /** `pipe` captures output into the result, defaults to `inherit`. */
    stdio?: StdioMode;
};

export type CommandResult = {
    exitCode: number;
    stdout: string;
    stderr: string;
};

export interface CommandRunner {
    /**
     * Runs a command to completion. Resolves with its exit code even when
     * it is non-zero; rejects with {@link CommandSpawnError} when the
     * command cannot be started at all.
     */
    run(
        command: string,
        args: readonly string[],
        options?: CommandOptions,
    ): Promise<CommandResult>;
}

export class CommandSpawnError extends Error {
    constructor(
        public readonly command: string,
        options?: { cause?: unknown },
    ) {
        super(`Failed to start ${command}`, options);
        super.name = this.constructor.name;
    }
}

/** Renders a command line the way a shell user would type it. */
export function formatCommandLine(
    command: string,
    args: readonly string[],
): string {
    return [command, ...args].join(" ");
}

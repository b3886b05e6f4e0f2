import path from "node:path";
import type { Process } from "@l2d/system-interface";

/**
 * Directory holding the running script, taken from the script path the
 * process was started with (`argv[1]`). Links are not resolved.
 */
export function resolveScriptDirectory(proc: Process): string {
    const scriptPath = proc.args()[1];

    if (!scriptPath) {
        throw new WorkingDirectoryError(
            "<unknown>",
            "the process was not started from a script",
        );
    }

    return path.dirname(path.resolve(proc.currentDir(), scriptPath));
}

/**
 * Makes the script directory the working directory. Nothing else may run
 * when this fails.
 */
export function enterScriptDirectory(proc: Process): string {
    const dir = resolveScriptDirectory(proc);

    try {
        proc.setCurrentDir(dir);
    } catch (e) {
        throw new WorkingDirectoryError(dir, errorMessage(e), { cause: e });
    }

    return proc.currentDir();
}

export class WorkingDirectoryError extends Error {
    constructor(
        public readonly dir: string,
        reason: string,
        options?: { cause?: unknown },
    ) {
        super(`Cannot enter ${dir}: ${reason}`, options);
        super.name = this.constructor.name;
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

import {
    CommandSpawnError,
    type ProcessEnv,
    type System,
} from "@l2d/system-interface";
import type { InstallerSettings } from "./settings";

// What a shell reports for a command it cannot run.
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export function includePathEnv(settings: InstallerSettings): ProcessEnv {
    return Object.fromEntries(
        settings.includePathVariables.map((name) => [
            name,
            settings.includePath,
        ]),
    );
}

/**
 * Runs `<entry point> install [...extraArgs]` from the current directory
 * with the include variables set for the child only, and returns its exit
 * code.
 */
export async function runSetupInstall(
    system: System,
    settings: InstallerSettings,
    extraArgs: readonly string[] = [],
): Promise<number> {
    const env = { ...system.proc.env(), ...includePathEnv(settings) };

    try {
        const result = await system.cmd.run(
            settings.setupEntryPoint,
            ["install", ...extraArgs],
            { cwd: system.proc.currentDir(), env, stdio: "inherit" },
        );
        return result.exitCode;
    } catch (e) {
        if (e instanceof CommandSpawnError) {
            const reason =
                e.cause instanceof Error ? `: ${e.cause.message}` : "";
            console.error(`${e.message}${reason}`);
            return COMMAND_NOT_FOUND_EXIT_CODE;
        }
        throw e;
    }
}

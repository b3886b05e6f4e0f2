import type { System } from "@l2d/system-interface";
import { resolveInstallerSettings, type InstallerSettings } from "./settings";
import { runSetupInstall } from "./setup-install";
import { enterScriptDirectory, errorMessage } from "./working-dir";

export const CREATING_DIST_PACKAGES_MESSAGE =
    "Python dist-packages dir does not exist. Creating it now...";

export function distPackagesDir(
    prefix: string,
    settings: InstallerSettings,
): string {
    return `${prefix}${settings.distPackagesSuffix}`;
}

/**
 * Installs under `prefix`, creating its dist-packages directory first when
 * missing. Resolves with the installer's exit code.
 */
export async function installToPrefixAt(
    prefix: string,
    system: System,
    settings: InstallerSettings = resolveInstallerSettings(),
): Promise<number> {
    enterScriptDirectory(system.proc);

    const distPackages = distPackagesDir(prefix, settings);
    if (!(await system.fs.pathExists(distPackages))) {
        console.log(CREATING_DIST_PACKAGES_MESSAGE);
        try {
            await system.fs.createDirectory(distPackages, { recursive: true });
        } catch (e) {
            // the installer still runs
            console.error(
                `mkdir: cannot create directory '${distPackages}': ${errorMessage(e)}`,
            );
        }
    }

    return runSetupInstall(system, settings, [
        `--prefix=${prefix}`,
        "--install-layout",
        settings.installLayout,
    ]);
}

import type { System } from "@l2d/system-interface";
import { resolveInstallerSettings, type InstallerSettings } from "./settings";
import { runSetupInstall } from "./setup-install";
import { enterScriptDirectory, errorMessage } from "./working-dir";

/**
 * Links the superbuild pdal into place unless something already answers
 * at the link path. A dangling link there is replaced. Returns the exit
 * status of the step: 0 when linked or skipped, 1 when linking failed.
 */
export async function linkPdal(
    system: System,
    settings: InstallerSettings,
): Promise<number> {
    const link = settings.pdalLinkPath;
    const target = settings.pdalTargetPath;

    if (await system.fs.pathExists(link)) {
        return 0;
    }

    try {
        if (await system.fs.isSymbolicLink(link)) {
            await system.fs.remove(link);
        }
        await system.fs.createSymbolicLink(target, link);
    } catch (e) {
        console.error(
            `ln: failed to create symbolic link '${link}': ${errorMessage(e)}`,
        );
        return 1;
    }

    console.log(`'${link}' -> '${target}'`);
    return 0;
}

/**
 * Installs with the default layout, then links pdal. Resolves with the
 * exit status of the link step; the installer's own exit code does not
 * reach the caller.
 */
export async function installFromSuperbuildAt(
    system: System,
    settings: InstallerSettings = resolveInstallerSettings(),
): Promise<number> {
    enterScriptDirectory(system.proc);

    await runSetupInstall(system, settings);

    return linkPdal(system, settings);
}

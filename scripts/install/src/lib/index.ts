export {
    installFromSuperbuildAt,
    linkPdal,
} from "./install-from-superbuild";
export {
    CREATING_DIST_PACKAGES_MESSAGE,
    distPackagesDir,
    installToPrefixAt,
} from "./install-to-prefix";
export {
    type InstallerSettings,
    type InstallerSettingsInput,
    InstallerSettingsSchema,
    InvalidInstallerSettingsError,
    resolveInstallerSettings,
} from "./settings";
export {
    COMMAND_NOT_FOUND_EXIT_CODE,
    includePathEnv,
    runSetupInstall,
} from "./setup-install";
export {
    enterScriptDirectory,
    resolveScriptDirectory,
    WorkingDirectoryError,
} from "./working-dir";

import { NodeSystem } from "@l2d/system-interface";
import { installFromSuperbuildAt } from "./install-from-superbuild";
import { installToPrefixAt } from "./install-to-prefix";
import {
    type InstallerSettingsInput,
    resolveInstallerSettings,
} from "./settings";

export async function installToPrefix(
    prefix: string,
    settings: InstallerSettingsInput = {},
): Promise<number> {
    return installToPrefixAt(
        prefix,
        await NodeSystem.create(),
        resolveInstallerSettings(settings),
    );
}

export async function installFromSuperbuild(
    settings: InstallerSettingsInput = {},
): Promise<number> {
    return installFromSuperbuildAt(
        await NodeSystem.create(),
        resolveInstallerSettings(settings),
    );
}

import z from "zod";

export const InstallerSettingsSchema = z.object({
    /** Header directory exported to the compiler through the include variables. */
    includePath: z.string().min(1).default("/usr/include/gdal"),
    includePathVariables: z
        .array(z.string().min(1))
        .default(["CPLUS_INCLUDE_PATH", "C_INCLUDE_PATH"]),
    /** Install entry point, relative to the script directory. */
    setupEntryPoint: z.string().min(1).default("./setup.py"),
    installLayout: z.string().min(1).default("deb"),
    /** Appended verbatim to the prefix. */
    distPackagesSuffix: z.string().default("/lib/python2.7/dist-packages/"),
    pdalLinkPath: z.string().min(1).default("/usr/bin/pdal"),
    pdalTargetPath: z
        .string()
        .min(1)
        .default("/code/SuperBuild/build/pdal/bin/pdal"),
});

export type InstallerSettings = z.infer<typeof InstallerSettingsSchema>;
export type InstallerSettingsInput = z.input<typeof InstallerSettingsSchema>;

export function resolveInstallerSettings(
    overrides: InstallerSettingsInput = {},
): InstallerSettings {
    const parsed = InstallerSettingsSchema.safeParse(overrides);

    if (parsed.success) {
        return parsed.data;
    } else {
        throw new InvalidInstallerSettingsError(parsed.error.message);
    }
}

export class InvalidInstallerSettingsError extends Error {
    constructor(message: string) {
        super(`Invalid installer settings: ${message}`);
        super.name = this.constructor.name;
    }
}

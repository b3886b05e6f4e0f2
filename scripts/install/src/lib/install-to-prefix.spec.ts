import { VirtualSystem } from "@l2d/system-interface";
import {
    afterEach,
    beforeEach,
    describe,
    expect,
    it,
    type MockInstance,
    vi,
} from "vitest";
import {
    CREATING_DIST_PACKAGES_MESSAGE,
    distPackagesDir,
    installToPrefixAt,
} from "./install-to-prefix";
import { resolveInstallerSettings } from "./settings";
import { COMMAND_NOT_FOUND_EXIT_CODE } from "./setup-install";
import { WorkingDirectoryError } from "./working-dir";

const SCRIPT_DIR = "/opt/l2d";
const DIST_PACKAGES = "/usr/lib/python2.7/dist-packages/";

async function createSystem(): Promise<VirtualSystem> {
    const system = await VirtualSystem.create({
        cwd: "/home/user",
        args: ["node", `${SCRIPT_DIR}/install-to-prefix.ts`],
        env: { PATH: "/usr/bin", HOME: "/home/user" },
    });
    await system.fs.createDirectory(SCRIPT_DIR, { recursive: true });
    return system;
}

describe("distPackagesDir", () => {
    it("should append the dist-packages suffix to the prefix verbatim", () => {
        const settings = resolveInstallerSettings();
        expect(distPackagesDir("/usr", settings)).toBe(DIST_PACKAGES);
        expect(distPackagesDir("/usr/", settings)).toBe(
            "/usr//lib/python2.7/dist-packages/",
        );
    });
});

describe("installToPrefixAt", () => {
    let log: MockInstance<typeof console.log>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
        log = vi.spyOn(console, "log").mockImplementation(() => {});
        error = vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should create a missing dist-packages dir and announce it before installing", async () => {
        const system = await createSystem();
        const loggedBeforeInstall: unknown[][] = [];
        system.cmd.on("./setup.py", () => {
            loggedBeforeInstall.push(...log.mock.calls);
            return 0;
        });

        const code = await installToPrefixAt("/usr", system);

        expect(code).toBe(0);
        expect(await system.fs.isDirectory(DIST_PACKAGES)).toBe(true);
        expect(log).toHaveBeenCalledTimes(1);
        expect(loggedBeforeInstall).toEqual([[CREATING_DIST_PACKAGES_MESSAGE]]);
    });

    it("should not announce or create an existing dist-packages dir", async () => {
        const system = await createSystem();
        await system.fs.createDirectory(DIST_PACKAGES, { recursive: true });
        await system.fs.writeStringToFile(`${DIST_PACKAGES}keep.pth`, "x");

        await installToPrefixAt("/usr", system);

        expect(log).not.toHaveBeenCalled();
        expect(await system.fs.readDirectory(DIST_PACKAGES)).toEqual([
            "keep.pth",
        ]);
        expect(system.cmd.invocations).toHaveLength(1);
    });

    it("should run the installer from the script dir with the prefix, layout and include paths", async () => {
        const system = await createSystem();

        await installToPrefixAt("/usr", system);

        expect(system.cmd.invocations).toEqual([
            {
                command: "./setup.py",
                args: ["install", "--prefix=/usr", "--install-layout", "deb"],
                cwd: SCRIPT_DIR,
                env: {
                    PATH: "/usr/bin",
                    HOME: "/home/user",
                    CPLUS_INCLUDE_PATH: "/usr/include/gdal",
                    C_INCLUDE_PATH: "/usr/include/gdal",
                },
                stdio: "inherit",
            },
        ]);
        expect(system.proc.currentDir()).toBe(SCRIPT_DIR);
    });

    it("should set the include paths regardless of the prefix", async () => {
        const system = await createSystem();

        await installToPrefixAt("/srv/python", system);

        const [invocation] = system.cmd.invocations;
        expect(invocation?.env.CPLUS_INCLUDE_PATH).toBe("/usr/include/gdal");
        expect(invocation?.env.C_INCLUDE_PATH).toBe("/usr/include/gdal");
        expect(invocation?.args).toEqual([
            "install",
            "--prefix=/srv/python",
            "--install-layout",
            "deb",
        ]);
    });

    it("should override inherited include paths for the installer only", async () => {
        const system = await VirtualSystem.create({
            args: ["node", `${SCRIPT_DIR}/install-to-prefix.ts`],
            env: { C_INCLUDE_PATH: "/opt/include" },
        });
        await system.fs.createDirectory(SCRIPT_DIR, { recursive: true });

        await installToPrefixAt("/usr", system);

        expect(system.cmd.invocations[0]?.env.C_INCLUDE_PATH).toBe(
            "/usr/include/gdal",
        );
        expect(system.proc.env()).toEqual({ C_INCLUDE_PATH: "/opt/include" });
    });

    it("should resolve a relative prefix against the script dir", async () => {
        const system = await createSystem();

        await installToPrefixAt("stage", system);

        expect(
            await system.fs.isDirectory(
                "/opt/l2d/stage/lib/python2.7/dist-packages",
            ),
        ).toBe(true);
        expect(await system.fs.pathExists("/home/user/stage")).toBe(false);
    });

    it("should resolve with the installer's exit code", async () => {
        const system = await createSystem();
        system.cmd.on("./setup.py", () => 2);

        expect(await installToPrefixAt("/usr", system)).toBe(2);
    });

    it("should still run the installer when the directory cannot be created", async () => {
        const system = await createSystem();
        await system.fs.writeStringToFile("/blocked", "not a directory");

        const code = await installToPrefixAt("/blocked", system);

        expect(code).toBe(0);
        expect(log).toHaveBeenCalledWith(CREATING_DIST_PACKAGES_MESSAGE);
        expect(error).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledWith(
            expect.stringContaining(
                "mkdir: cannot create directory '/blocked/lib/python2.7/dist-packages/'",
            ),
        );
        expect(system.cmd.invocations[0]?.args).toEqual([
            "install",
            "--prefix=/blocked",
            "--install-layout",
            "deb",
        ]);
    });

    it("should report an installer that cannot be started", async () => {
        const system = await createSystem();
        system.cmd.markMissing("./setup.py");

        const code = await installToPrefixAt("/usr", system);

        expect(code).toBe(COMMAND_NOT_FOUND_EXIT_CODE);
        expect(error).toHaveBeenCalledWith("Failed to start ./setup.py");
    });

    it("should abort before any other step when the script dir cannot be entered", async () => {
        const system = await VirtualSystem.create({
            args: ["node", "/missing/install-to-prefix.ts"],
        });

        await expect(installToPrefixAt("/usr", system)).rejects.toThrow(
            WorkingDirectoryError,
        );
        expect(log).not.toHaveBeenCalled();
        expect(await system.fs.pathExists(DIST_PACKAGES)).toBe(false);
        expect(system.cmd.invocations).toEqual([]);
    });
});

import { VirtualProcess } from "@l2d/system-interface";
import { describe, expect, it } from "vitest";
import {
    enterScriptDirectory,
    resolveScriptDirectory,
    WorkingDirectoryError,
} from "./working-dir";

describe("resolveScriptDirectory", () => {
    it("should use the directory of the script path", () => {
        const proc = new VirtualProcess({
            cwd: "/home/user",
            args: ["node", "/opt/l2d/cli/install.ts", "/usr"],
        });
        expect(resolveScriptDirectory(proc)).toBe("/opt/l2d/cli");
    });

    it("should resolve a relative script path against the current directory", () => {
        const proc = new VirtualProcess({
            cwd: "/home/user",
            args: ["node", "tools/install.ts"],
        });
        expect(resolveScriptDirectory(proc)).toBe("/home/user/tools");
    });

    it("should fail when there is no script path", () => {
        const proc = new VirtualProcess({ args: ["node"] });
        expect(() => resolveScriptDirectory(proc)).toThrow(
            WorkingDirectoryError,
        );
    });
});

describe("enterScriptDirectory", () => {
    it("should change into the script directory", () => {
        const proc = new VirtualProcess({
            cwd: "/tmp",
            args: ["node", "/opt/l2d/install.ts"],
        });
        expect(enterScriptDirectory(proc)).toBe("/opt/l2d");
        expect(proc.currentDir()).toBe("/opt/l2d");
    });

    it("should wrap the failure to change directory", () => {
        const proc = new VirtualProcess({
            cwd: "/tmp",
            args: ["node", "/opt/l2d/install.ts"],
            isDirectory: () => false,
        });
        expect(() => enterScriptDirectory(proc)).toThrow(
            "Cannot enter /opt/l2d: ENOENT: no such file or directory, chdir '/opt/l2d'",
        );
        expect(proc.currentDir()).toBe("/tmp");
    });
});

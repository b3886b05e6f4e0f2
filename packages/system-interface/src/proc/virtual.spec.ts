import { describe, expect, it } from "vitest";
import { declareProcTests } from "./test-declarations";
import { NoSuchDirectoryError, VirtualProcess } from "./virtual";

declareProcTests({
    name: "Virtual",
    args: ["node", "/opt/l2d/install.ts"],
    currentDir: "/home/user",
    env: { HOME: "/home/user" },
    newCurrentDir: "/opt/l2d",
    tempDir: "/var/tmp",
    proc: new VirtualProcess({
        cwd: "/home/user",
        args: ["node", "/opt/l2d/install.ts"],
        env: { HOME: "/home/user" },
        tempDir: "/var/tmp",
    }),
});

describe("VirtualProcess", () => {
    it("should default to the root directory", async () => {
        const proc = await VirtualProcess.create();
        expect(proc.currentDir()).toBe("/");
        expect(proc.tempDir()).toBe("/tmp");
    });

    it("should resolve relative directories against the current one", () => {
        const proc = new VirtualProcess({ cwd: "/home/user" });
        proc.setCurrentDir("../other");
        expect(proc.currentDir()).toBe("/home/other");
    });

    it("should refuse directories the predicate rejects", () => {
        const proc = new VirtualProcess({
            cwd: "/home/user",
            isDirectory: (dir) => dir === "/home/user",
        });
        expect(() => proc.setCurrentDir("/missing")).toThrow(
            NoSuchDirectoryError,
        );
        expect(proc.currentDir()).toBe("/home/user");
    });
});

import path from "node:path";
import { describe, expect } from "vitest";
import { it } from "../test-helpers";
import type { System } from "./interfaces";

export type SystemTestDeclarationsArgs = {
    name: string;
    sys: System;
    skip?: boolean;
    isRealSystem?: boolean;
};

export function declareSysTests(args: SystemTestDeclarationsArgs): void {
    const isRealSystem = args.isRealSystem ?? true;

    async function withFixture(
        dir: string,
        test: () => Promise<void>,
    ): Promise<void> {
        if (!(await args.sys.fs.pathExists(dir))) {
            await args.sys.fs.createDirectory(dir, {
                recursive: true,
            });
        }
        try {
            await test();
        } finally {
            if (await args.sys.fs.pathExists(dir)) {
                await args.sys.fs.remove(dir, {
                    recursive: true,
                });
            }
        }
    }

    describe
        .skipIf(args.skip ?? false)
        .sequential(`System ${args.name}`, () => {
            async function expectRelativePathsToFollowCurrentDirectory(
                dir: string,
            ) {
                const previous = args.sys.proc.currentDir();
                args.sys.proc.setCurrentDir(dir);
                try {
                    await args.sys.fs.writeStringToFile("test.txt", "test");
                    const contents = await args.sys.fs.readFileAsString(
                        path.join(dir, "test.txt"),
                    );
                    expect(contents).toBe("test");
                } finally {
                    args.sys.proc.setCurrentDir(previous);
                }
            }

            if (isRealSystem) {
                it("should resolve relative paths against the current directory", async ({
                    realDir,
                }) => {
                    await expectRelativePathsToFollowCurrentDirectory(realDir);
                });
            } else {
                it("should resolve relative paths against the current directory", async ({
                    tempDir,
                }) => {
                    await withFixture(tempDir, () =>
                        expectRelativePathsToFollowCurrentDirectory(tempDir),
                    );
                });
            }

            it("should refuse to enter a missing directory", () => {
                const previous = args.sys.proc.currentDir();
                expect(() =>
                    args.sys.proc.setCurrentDir("/definitely/not/here"),
                ).toThrow();
                expect(args.sys.proc.currentDir()).toBe(previous);
            });
        });
}

import path from "node:path";
import { describe, expect } from "vitest";
import { it } from "../test-helpers";
import type { FileSystem } from "./interfaces";

export type FileSystemTestDeclarationsArgs = {
    name: string;
    skip?: boolean;
    fs: FileSystem;
    useRealDir?: boolean;
};

export function declareFsTests(args: FileSystemTestDeclarationsArgs): void {
    const useRealDir = args.useRealDir ?? true;

    async function withFixture(
        dir: string,
        test: () => Promise<void>,
    ): Promise<void> {
        if (!(await args.fs.pathExists(dir))) {
            await args.fs.createDirectory(dir, {
                recursive: true,
            });
        }
        try {
            await test();
        } finally {
            if (await args.fs.pathExists(dir)) {
                await args.fs.remove(dir, {
                    recursive: true,
                });
            }
        }
    }

    function declare(
        name: string,
        expectation: (dir: string) => Promise<void>,
    ): void {
        if (useRealDir) {
            it(name, async ({ realDir }) => {
                await expectation(realDir);
            });
        } else {
            it(name, async ({ tempDir }) => {
                await withFixture(tempDir, () => expectation(tempDir));
            });
        }
    }

    describe.skipIf(args.skip ?? false)(`FileSystem ${args.name}`, () => {
        declare("should be able to write and read a file", async (dir) => {
            const p = path.join(dir, "test.txt");
            await args.fs.writeStringToFile(p, "test");
            const contents = await args.fs.readFileAsString(p);
            expect(contents).toBe("test");
        });

        declare("should be able to remove a file", async (dir) => {
            const p = path.join(dir, "test.txt");
            await args.fs.writeStringToFile(p, "test");
            await args.fs.remove(p);
            expect(await args.fs.pathExists(p)).toBe(false);
        });

        declare("should be able to create a directory", async (dir) => {
            const p = path.join(dir, "test");
            await args.fs.createDirectory(p);
            expect(await args.fs.pathExists(p)).toBe(true);
        });

        declare(
            "should create parent directories when recursive",
            async (dir) => {
                const p = `${dir}/lib/python2.7/dist-packages/`;
                await args.fs.createDirectory(p, { recursive: true });
                expect(await args.fs.isDirectory(p)).toBe(true);
            },
        );

        declare(
            "should fail to create nested directories when not recursive",
            async (dir) => {
                const p = path.join(dir, "a", "b");
                await expect(args.fs.createDirectory(p)).rejects.toThrow();
            },
        );

        declare("should be able to remove a directory", async (dir) => {
            const p = path.join(dir, "test");
            await args.fs.createDirectory(p);
            await args.fs.writeStringToFile(path.join(p, "test.txt"), "test");
            await args.fs.remove(p, {
                recursive: true,
            });
            expect(await args.fs.pathExists(p)).toBe(false);
        });

        declare("should be able to read a directory", async (dir) => {
            const p = path.join(dir, "test");
            await args.fs.createDirectory(p);
            await args.fs.writeStringToFile(path.join(p, "test.txt"), "test");
            await args.fs.createDirectory(path.join(p, "nested"));
            const contents = await args.fs.readDirectory(p);
            expect(contents.sort()).toEqual(["nested", "test.txt"]);
        });

        declare("should tell files from directories", async (dir) => {
            const file = path.join(dir, "test.txt");
            const sub = path.join(dir, "test");
            await args.fs.writeStringToFile(file, "test");
            await args.fs.createDirectory(sub);
            expect(await args.fs.isDirectory(file)).toBe(false);
            expect(await args.fs.isDirectory(sub)).toBe(true);
        });

        declare(
            "should reject a directory check on a missing path",
            async (dir) => {
                await expect(
                    args.fs.isDirectory(path.join(dir, "nothing")),
                ).rejects.toThrow();
            },
        );

        declare("should create a symbolic link", async (dir) => {
            const target = path.join(dir, "target.txt");
            const link = path.join(dir, "link.txt");
            await args.fs.writeStringToFile(target, "linked");
            await args.fs.createSymbolicLink(target, link);
            expect(await args.fs.isSymbolicLink(link)).toBe(true);
            expect(await args.fs.readFileAsString(link)).toBe("linked");
        });

        declare(
            "should report a dangling symbolic link as not existing",
            async (dir) => {
                const link = path.join(dir, "dangling");
                await args.fs.createSymbolicLink(
                    path.join(dir, "missing"),
                    link,
                );
                expect(await args.fs.pathExists(link)).toBe(false);
                expect(await args.fs.isSymbolicLink(link)).toBe(true);
                await args.fs.remove(link);
                expect(await args.fs.isSymbolicLink(link)).toBe(false);
            },
        );

        declare(
            "should not report regular files as symbolic links",
            async (dir) => {
                const p = path.join(dir, "test.txt");
                await args.fs.writeStringToFile(p, "test");
                expect(await args.fs.isSymbolicLink(p)).toBe(false);
                expect(
                    await args.fs.isSymbolicLink(path.join(dir, "nothing")),
                ).toBe(false);
            },
        );
    });
}

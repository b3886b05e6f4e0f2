import { describe, expect, it } from "vitest";
import type { Process } from "./interfaces";

export type ProcessTestDeclarationsArgs = {
    name: string;
    proc: Process;
    currentDir: string;
    newCurrentDir: string;
    args: string[];
    env: Record<string, string | undefined>;
    tempDir: string;
    skip?: boolean;
};

export function declareProcTests(args: ProcessTestDeclarationsArgs): void {
    describe.skipIf(args.skip ?? false).sequential(`Process ${args.name}`, () => {
        it("currentDir should be the starting directory", () => {
            expect(args.proc.currentDir()).toBe(args.currentDir);
        });

        it("setCurrentDir should set cwd", () => {
            try {
                args.proc.setCurrentDir(args.newCurrentDir);
                expect(args.proc.currentDir()).toBe(args.newCurrentDir);
            } finally {
                args.proc.setCurrentDir(args.currentDir);
            }
        });

        it("args should match the provided args", () => {
            expect(args.proc.args()).toEqual(args.args);
        });

        it("env should match the provided env", () => {
            expect(args.proc.env()).toEqual(args.env);
        });

        it("tempDir should match the provided temp dir", () => {
            expect(args.proc.tempDir()).toBe(args.tempDir);
        });
    });
}

import { describe, expect, it } from "vitest";
import { type CommandRunner, CommandSpawnError } from "./interfaces";

export type CommandRunnerTestDeclarationsArgs = {
    name: string;
    runner: CommandRunner;
    /**
     * A command that prints its first argument to stdout, the value of
     * the `GREETING` variable to stderr, and exits with its second
     * argument as the exit code.
     */
    echo: { command: string; args: (text: string, code: number) => string[] };
    missingCommand: string;
    skip?: boolean;
};

export function declareCommandRunnerTests(
    args: CommandRunnerTestDeclarationsArgs,
): void {
    describe.skipIf(args.skip ?? false)(`CommandRunner ${args.name}`, () => {
        it("should capture output when piped", async () => {
            const result = await args.runner.run(
                args.echo.command,
                args.echo.args("hello", 0),
                { stdio: "pipe", env: { GREETING: "hi" } },
            );
            expect(result).toEqual({
                exitCode: 0,
                stdout: "hello",
                stderr: "hi",
            });
        });

        it("should resolve with a non-zero exit code", async () => {
            const result = await args.runner.run(
                args.echo.command,
                args.echo.args("failing", 3),
                { stdio: "pipe", env: { GREETING: "" } },
            );
            expect(result.exitCode).toBe(3);
        });

        it("should reject when the command cannot be started", async () => {
            await expect(
                args.runner.run(args.missingCommand, [], { stdio: "ignore" }),
            ).rejects.toThrow(CommandSpawnError);
        });
    });
}

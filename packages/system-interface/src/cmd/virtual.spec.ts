import { describe, expect, it } from "vitest";
import { VirtualProcess } from "../proc";
import { CommandSpawnError } from "./interfaces";
import { declareCommandRunnerTests } from "./test-declarations";
import { VirtualCommandRunner } from "./virtual";

declareCommandRunnerTests({
    name: "Virtual",
    runner: new VirtualCommandRunner(new VirtualProcess())
        .on("echo", ({ args, env }) => ({
            exitCode: Number(args[1]),
            stdout: args[0],
            stderr: env.GREETING,
        }))
        .markMissing("missing"),
    echo: {
        command: "echo",
        args: (text, code) => [text, String(code)],
    },
    missingCommand: "missing",
});

describe("VirtualCommandRunner", () => {
    it("should record invocations with the process defaults", async () => {
        const proc = new VirtualProcess({
            cwd: "/work",
            env: { PATH: "/usr/bin" },
        });
        const runner = new VirtualCommandRunner(proc);

        const result = await runner.run("make", ["all"]);

        expect(result).toEqual({ exitCode: 0, stdout: "", stderr: "" });
        expect(runner.invocations).toEqual([
            {
                command: "make",
                args: ["all"],
                cwd: "/work",
                env: { PATH: "/usr/bin" },
                stdio: "inherit",
            },
        ]);
    });

    it("should treat a numeric handler result as the exit code", async () => {
        const runner = new VirtualCommandRunner(new VirtualProcess()).on(
            "false",
            () => 1,
        );

        const result = await runner.run("false", []);

        expect(result.exitCode).toBe(1);
    });

    it("should record commands that fail to start", async () => {
        const runner = new VirtualCommandRunner(
            new VirtualProcess(),
        ).markMissing("./setup.py");

        await expect(runner.run("./setup.py", ["install"])).rejects.toThrow(
            CommandSpawnError,
        );
        expect(runner.invocations).toHaveLength(1);
    });
});

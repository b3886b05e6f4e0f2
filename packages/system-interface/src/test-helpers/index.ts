import { randomUUID } from "node:crypto";
import fsPromises from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test as vitestTest } from "vitest";

export const test = vitestTest.extend<{ tempDir: string; realDir: string }>({
    // biome-ignore lint/correctness/noEmptyPattern: This is a Vitest extension
    async tempDir({}, run) {
        const tempdir = path.join(os.tmpdir(), `vitest-test-${randomUUID()}`);

        await run(tempdir);
    },
    async realDir({ tempDir }, run) {
        await fsPromises.mkdir(tempDir);
        try {
            await run(tempDir);
        } finally {
            await fsPromises.rm(tempDir, { recursive: true });
        }
    },
});

export const it = test;

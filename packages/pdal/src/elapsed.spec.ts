import { describe, expect, it } from "vitest";
import { formatElapsed } from "./elapsed";

describe("formatElapsed", () => {
    it("should use milliseconds below a second", () => {
        expect(formatElapsed(250.4)).toBe("250ms");
    });

    it("should use seconds below a minute", () => {
        expect(formatElapsed(1500)).toBe("1.50s");
    });

    it("should split minutes and seconds", () => {
        expect(formatElapsed(125_000)).toBe("2m 5.0s");
    });
});

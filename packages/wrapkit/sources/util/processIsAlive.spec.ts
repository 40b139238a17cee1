import { describe, expect, it } from "vitest";

import { processIsAlive } from "./processIsAlive.js";

describe("processIsAlive", () => {
    it("detects the current process", () => {
        expect(processIsAlive(process.pid)).toBe(true);
    });

    it("rejects invalid pids", () => {
        expect(processIsAlive(0)).toBe(false);
        expect(processIsAlive(-5)).toBe(false);
        expect(processIsAlive(1.5)).toBe(false);
    });
});

import { describe, expect, it } from "vitest";

import { hookFailureModeEnvRead } from "./hookFailureModeEnvRead.js";

describe("hookFailureModeEnvRead", () => {
    it("reads the override case-insensitively", () => {
        expect(hookFailureModeEnvRead({ WRAPKIT_HOOK_FAILURE: "ABORT" })).toBe("abort");
        expect(hookFailureModeEnvRead({ WRAPKIT_HOOK_FAILURE: " ignore " })).toBe("ignore");
    });

    it("ignores missing and unknown values", () => {
        expect(hookFailureModeEnvRead({})).toBeNull();
        expect(hookFailureModeEnvRead({ WRAPKIT_HOOK_FAILURE: "" })).toBeNull();
        expect(hookFailureModeEnvRead({ WRAPKIT_HOOK_FAILURE: "explode" })).toBeNull();
    });
});

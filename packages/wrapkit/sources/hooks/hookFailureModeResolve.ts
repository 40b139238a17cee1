import type { FailureMode } from "../preferences/preferenceTypes.js";
import type { FailureModeChain } from "./hookTypes.js";

export const HOOK_FAILURE_MODE_DEFAULT: FailureMode = "warn";

/**
 * First non-empty value wins: runtime, environment, app, global, then the built-in default.
 */
export function hookFailureModeResolve(chain: FailureModeChain): FailureMode {
    return chain.runtime ?? chain.env ?? chain.app ?? chain.global ?? HOOK_FAILURE_MODE_DEFAULT;
}

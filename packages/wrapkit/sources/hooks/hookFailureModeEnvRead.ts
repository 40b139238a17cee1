import { getLogger } from "../log.js";
import { type FailureMode, failureModeIs } from "../preferences/preferenceTypes.js";
import { envValue } from "../util/envValue.js";

const logger = getLogger("hooks.env");

export const HOOK_FAILURE_ENV = "WRAPKIT_HOOK_FAILURE";

/**
 * Reads the environment failure-mode override. Unknown values are ignored with a warning.
 */
export function hookFailureModeEnvRead(env: NodeJS.ProcessEnv): FailureMode | null {
    const value = envValue(env, HOOK_FAILURE_ENV);
    if (value === null) {
        return null;
    }
    const normalized = value.toLowerCase();
    if (failureModeIs(normalized)) {
        return normalized;
    }
    logger.warn({ value: JSON.stringify(value.slice(0, 40)) }, `ignoring unknown ${HOOK_FAILURE_ENV} value`);
    return null;
}

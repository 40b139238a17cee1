import { SAFETY_OK, type SafetyResult } from "./safetyTypes.js";

const PERMISSION_FLAG = /^--[a-z][a-z0-9-]*(=[^\s;|&`$()<>\\'"]+)?$/;

/**
 * Validates one sandbox permission flag such as `--share=network` or `--device=dri`.
 */
export function validatePermissionFlag(flag: string): SafetyResult {
    if (!PERMISSION_FLAG.test(flag)) {
        return { ok: false, code: "REJECTED", reason: "Permission flag must look like --name or --name=value." };
    }
    return SAFETY_OK;
}

import { SAFETY_OK, type SafetyResult } from "./safetyTypes.js";

const PACKAGE_ID = /^[A-Za-z0-9._-]+$/;

/**
 * Validates a reverse-DNS package identifier such as `org.mozilla.firefox`.
 */
export function validatePackageId(id: string): SafetyResult {
    if (!PACKAGE_ID.test(id) || !id.includes(".") || id.startsWith(".") || id.endsWith(".") || id.includes("..")) {
        return { ok: false, code: "FORBIDDEN", reason: "Package id must be a dotted name of letters, digits, '.', '_' or '-'." };
    }
    return SAFETY_OK;
}

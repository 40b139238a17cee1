import { SAFETY_OK, type SafetyResult } from "./safetyTypes.js";

const SHELL_METACHARACTERS = /[;|&`$()<>\n\r\0]/;
const IDENTIFIER_MAX_LENGTH = 255;

/**
 * Checks the shape of an identifier without consulting the deny-list or block-list.
 */
export function validateIdentifierSyntax(raw: string): SafetyResult {
    if (raw.trim().length === 0) {
        return forbidden("Identifier is empty.");
    }
    if (raw.length > IDENTIFIER_MAX_LENGTH) {
        return forbidden("Identifier is too long.");
    }
    if (SHELL_METACHARACTERS.test(raw)) {
        return forbidden("Identifier contains a shell metacharacter.");
    }
    if (/\s/.test(raw)) {
        return forbidden("Identifier contains whitespace.");
    }
    if (raw.includes("/") || raw === "." || raw === "..") {
        return forbidden("Identifier contains a path component.");
    }
    return SAFETY_OK;
}

function forbidden(reason: string): SafetyResult {
    return { ok: false, code: "FORBIDDEN", reason };
}

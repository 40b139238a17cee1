import { safetyCommandDenyList } from "./safetyCommandDenyList.js";
import type { SafetyResult } from "./safetyTypes.js";
import { validateIdentifierSyntax } from "./validateIdentifierSyntax.js";

/**
 * Validates a wrapper, alias or app identifier.
 * Rejects shell metacharacters, path separators, blank input and names on the
 * built-in deny-list or the user block-list. List matching is exact and case-sensitive.
 */
export function validateIdentifierFormat(raw: string, blocklist: Iterable<string> = []): SafetyResult {
    const syntax = validateIdentifierSyntax(raw);
    if (!syntax.ok) {
        return syntax;
    }
    if (safetyCommandDenyList().has(raw)) {
        return { ok: false, code: "FORBIDDEN", reason: "Identifier names a system-critical command." };
    }
    for (const blocked of blocklist) {
        if (blocked === raw) {
            return { ok: false, code: "FORBIDDEN", reason: "Identifier is on the block-list." };
        }
    }
    return syntax;
}

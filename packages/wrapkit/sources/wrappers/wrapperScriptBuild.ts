import { safetyAssert } from "../safety/safetyAssert.js";
import { validateIdentifierFormat } from "../safety/validateIdentifierFormat.js";
import { validatePackageId } from "../safety/validatePackageId.js";

export const WRAPPER_MARKER = "# Generated by wrapkit";

/**
 * Produces the text of a wrapper script for one package.
 * Both values are validated first, so they are safe to embed unquoted-by-shell.
 */
export function wrapperScriptBuild(name: string, packageId: string, blocklist: string[] = []): string {
    safetyAssert(validateIdentifierFormat(name, blocklist), name);
    safetyAssert(validatePackageId(packageId), packageId);
    return [
        "#!/bin/sh",
        WRAPPER_MARKER,
        `# Package: ${packageId}`,
        `NAME="${name}"`,
        `ID="${packageId}"`,
        'exec wrapkit launch -- "$NAME" "$@"',
        ""
    ].join("\n");
}

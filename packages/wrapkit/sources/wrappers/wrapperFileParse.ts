import { validatePackageId } from "../safety/validatePackageId.js";
import { WRAPPER_MARKER } from "./wrapperScriptBuild.js";

const CONTROL_CHARACTERS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f]/;

/**
 * Extracts the package id from wrapper script text, or null when the text is not a wrapper.
 */
export function wrapperFileParse(content: string): string | null {
    if (CONTROL_CHARACTERS.test(content)) {
        return null;
    }
    if (!/^#!.*\b(ba)?sh\b/.test(content)) {
        return null;
    }
    if (!content.includes(WRAPPER_MARKER)) {
        return null;
    }
    if (!/^NAME=/m.test(content)) {
        return null;
    }
    const idMatch = /^ID="([^"\n]*)"$/m.exec(content);
    const packageId = idMatch?.[1];
    if (packageId === undefined || !validatePackageId(packageId).ok) {
        return null;
    }
    return packageId;
}

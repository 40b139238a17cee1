import { promises as fs } from "node:fs";
import path from "node:path";

import { errorCodeIs } from "../util/lineFileRead.js";
import { pathExpandHome } from "../util/pathExpandHome.js";
import { pathIsWithin } from "../util/pathIsWithin.js";
import { SAFETY_OK, type SafetyResult } from "./safetyTypes.js";

const ENCODED_TRAVERSAL = /%2e|%2f|%5c|%00/i;

/**
 * Checks that a path resolves, after following symlinks, to homeDir or a descendant.
 * Any raw `..` segment or encoded traversal sequence is rejected before resolution.
 * Expects: path is absolute or starts with `~/`.
 */
export async function validatePathWithinHome(target: string, homeDir: string): Promise<SafetyResult> {
    if (target.length === 0 || target.includes("\0")) {
        return traversal("Path is empty or contains a null byte.");
    }
    if (ENCODED_TRAVERSAL.test(target)) {
        return traversal("Path contains an encoded traversal sequence.");
    }
    if (target.split(/[\\/]+/).includes("..")) {
        return traversal("Path contains a parent directory segment.");
    }

    const expanded = pathExpandHome(target, homeDir);
    if (!path.isAbsolute(expanded)) {
        return traversal("Path must be absolute.");
    }

    const realHome = await realpathExisting(path.resolve(homeDir));
    const realTarget = await realpathExisting(path.resolve(expanded));
    if (!pathIsWithin(realHome, realTarget)) {
        return traversal("Path resolves outside the home directory.");
    }
    return SAFETY_OK;
}

/**
 * Resolves symlinks on the deepest existing ancestor and re-appends the missing tail.
 */
async function realpathExisting(absolute: string): Promise<string> {
    const missing: string[] = [];
    let current = absolute;
    for (;;) {
        try {
            const real = await fs.realpath(current);
            return missing.length === 0 ? real : path.join(real, ...missing.reverse());
        } catch (error) {
            if (!errorCodeIs(error, "ENOENT") && !errorCodeIs(error, "ENOTDIR")) {
                throw error;
            }
            const parent = path.dirname(current);
            if (parent === current) {
                return absolute;
            }
            missing.push(path.basename(current));
            current = parent;
        }
    }
}

function traversal(reason: string): SafetyResult {
    return { ok: false, code: "TRAVERSAL", reason };
}

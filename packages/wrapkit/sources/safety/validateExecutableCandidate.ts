import { constants, promises as fs, type Stats } from "node:fs";

import { errorCodeIs } from "../util/lineFileRead.js";
import { SAFETY_OK, type SafetyResult } from "./safetyTypes.js";

export const EXECUTABLE_SIZE_MAX_BYTES = 100_000;

export type ExecutableCandidateOptions = {
    /** Require an interpreter marker (`#!`) on the first line. Defaults to true. */
    script?: boolean;
    /** Also require the execute permission bit. */
    executable?: boolean;
};

/**
 * Checks that a path is a readable regular file small enough to be a script.
 * Symlinks, directories and devices are rejected without being followed.
 */
export async function validateExecutableCandidate(
    target: string,
    options: ExecutableCandidateOptions = {}
): Promise<SafetyResult> {
    let stats: Stats;
    try {
        stats = await fs.lstat(target);
    } catch (error) {
        if (errorCodeIs(error, "ENOENT") || errorCodeIs(error, "ENOTDIR")) {
            return rejected("File does not exist.");
        }
        throw error;
    }
    if (stats.isSymbolicLink()) {
        return rejected("File is a symbolic link.");
    }
    if (!stats.isFile()) {
        return rejected("Path is not a regular file.");
    }
    if (stats.size > EXECUTABLE_SIZE_MAX_BYTES) {
        return rejected(`File exceeds ${EXECUTABLE_SIZE_MAX_BYTES} bytes.`);
    }

    const mode = options.executable ? constants.R_OK | constants.X_OK : constants.R_OK;
    try {
        await fs.access(target, mode);
    } catch {
        return rejected(options.executable ? "File is not executable." : "File is not readable.");
    }

    if (options.script ?? true) {
        const handle = await fs.open(target, "r");
        try {
            const buffer = Buffer.alloc(2);
            const { bytesRead } = await handle.read(buffer, 0, 2, 0);
            if (bytesRead < 2 || buffer.toString("latin1") !== "#!") {
                return rejected("Script does not start with an interpreter line.");
            }
        } finally {
            await handle.close();
        }
    }

    return SAFETY_OK;
}

function rejected(reason: string): SafetyResult {
    return { ok: false, code: "REJECTED", reason };
}

import { promises as fs, type Stats } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import { getLogger } from "../log.js";
import { EXECUTABLE_SIZE_MAX_BYTES } from "../safety/validateExecutableCandidate.js";
import { validateIdentifierSyntax } from "../safety/validateIdentifierSyntax.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { wrapperFileParse } from "./wrapperFileParse.js";

const logger = getLogger("wrappers.registry");

const HEADER_BYTES = 8192;

/**
 * Scans binDir for generated wrappers and returns wrapper name -> package id.
 * Symlinks, oversized files and anything without the wrapper marker are skipped.
 */
export async function wrapperRegistryRead(binDir: string): Promise<Map<string, string>> {
    let entries: string[];
    try {
        entries = await fs.readdir(binDir);
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return new Map();
        }
        throw error;
    }

    const registry = new Map<string, string>();
    for (const entry of entries.sort()) {
        if (!validateIdentifierSyntax(entry).ok) {
            continue;
        }
        const packageId = await wrapperFileRead(path.join(binDir, entry));
        if (packageId) {
            registry.set(entry, packageId);
        }
    }
    logger.debug({ binDir, count: registry.size }, "wrapper registry scanned");
    return registry;
}

async function wrapperFileRead(filePath: string): Promise<string | null> {
    let stats: Stats;
    try {
        stats = await fs.lstat(filePath);
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return null;
        }
        throw error;
    }
    if (!stats.isFile() || stats.size > EXECUTABLE_SIZE_MAX_BYTES) {
        return null;
    }
    let handle: FileHandle;
    try {
        handle = await fs.open(filePath, "r");
    } catch (error) {
        if (errorCodeIs(error, "EACCES") || errorCodeIs(error, "ENOENT")) {
            return null;
        }
        throw error;
    }
    try {
        const buffer = Buffer.alloc(Math.min(HEADER_BYTES, stats.size));
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
        return wrapperFileParse(buffer.subarray(0, bytesRead).toString("utf8"));
    } finally {
        await handle.close();
    }
}

import { constants, promises as fs } from "node:fs";
import path from "node:path";

/**
 * Returns the first executable named `name` on the search path that is not one of `excluded`
 * (the wrapper's own installed locations). Symlinked entries are compared by their resolved target.
 */
export async function launchSystemBinaryFind(
    name: string,
    searchPath: readonly string[],
    excluded: readonly string[]
): Promise<string | null> {
    const excludedReal = new Set<string>();
    for (const entry of excluded) {
        excludedReal.add(path.resolve(entry));
        const real = await realpathOrNull(entry);
        if (real) {
            excludedReal.add(real);
        }
    }

    for (const dir of searchPath) {
        if (!path.isAbsolute(dir)) {
            continue;
        }
        const candidate = path.join(dir, name);
        const real = await realpathOrNull(candidate);
        if (!real || excludedReal.has(path.resolve(candidate)) || excludedReal.has(real)) {
            continue;
        }
        if (await isExecutableFile(real)) {
            return candidate;
        }
    }
    return null;
}

async function realpathOrNull(target: string): Promise<string | null> {
    try {
        return await fs.realpath(target);
    } catch {
        return null;
    }
}

async function isExecutableFile(target: string): Promise<boolean> {
    try {
        const stats = await fs.stat(target);
        if (!stats.isFile()) {
            return false;
        }
        await fs.access(target, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

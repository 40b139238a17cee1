import path from "node:path";

/**
 * Checks lexical containment of target in base.
 * Does NOT resolve symlinks; pass real paths.
 */
export function pathIsWithin(base: string, target: string): boolean {
    const relative = path.relative(base, target);
    return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

import path from "node:path";

/**
 * Expands a leading `~` against homeDir; other paths are returned as given.
 */
export function pathExpandHome(target: string, homeDir: string): string {
    if (target === "~") {
        return homeDir;
    }
    if (target.startsWith("~/")) {
        return path.join(homeDir, target.slice(2));
    }
    return target;
}

/**
 * Reads a trimmed, non-empty environment value.
 */
export function envValue(env: NodeJS.ProcessEnv, key: string): string | null {
    const value = env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

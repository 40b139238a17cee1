import { readFileSync } from "node:fs";

import { z } from "zod";

const denyListSchema = z.object({
    commands: z.array(z.string().min(1))
});

let cached: ReadonlySet<string> | null = null;

/**
 * Returns the built-in deny-list of system-critical command names.
 * Loaded once from the bundled JSON data file.
 */
export function safetyCommandDenyList(): ReadonlySet<string> {
    if (cached) {
        return cached;
    }
    const raw = readFileSync(new URL("./safetyCommandDenyList.json", import.meta.url), "utf8");
    const parsed = denyListSchema.parse(JSON.parse(raw));
    cached = new Set(parsed.commands);
    return cached;
}

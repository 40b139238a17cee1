import { readFileSync } from "node:fs";

import { z } from "zod";

import { freezeDeep } from "../util/freezeDeep.js";

const presetBuiltinsSchema = z.object({
    presets: z.record(z.array(z.string()))
});

let cached: Readonly<Record<string, readonly string[]>> | null = null;

/**
 * Returns the bundled permission presets keyed by name.
 */
export function presetBuiltins(): Readonly<Record<string, readonly string[]>> {
    if (cached) {
        return cached;
    }
    const raw = readFileSync(new URL("./presetBuiltins.json", import.meta.url), "utf8");
    cached = freezeDeep(presetBuiltinsSchema.parse(JSON.parse(raw)).presets);
    return cached;
}

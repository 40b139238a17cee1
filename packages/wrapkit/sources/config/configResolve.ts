import path from "node:path";

import { APP_DIR_NAME, homeDirResolve, packageExportPathsResolve } from "../paths.js";
import { envValue } from "../util/envValue.js";
import { freezeDeep } from "../util/freezeDeep.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

const DEFAULT_HOOK_TIMEOUT_MS = 30_000;
const DEFAULT_PROMPT_TIMEOUT_MS = 30_000;
const DEFAULT_BATCH_WINDOW_MS = 1_000;
const DEFAULT_BATCH_COOLDOWN_MS = 2_000;
const DEFAULT_PACKAGE_RUNTIME = "flatpak";

/**
 * Resolves derived paths and defaults into an immutable Config snapshot.
 * Expects: env is the process environment (or a test copy of it).
 */
export function configResolve(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): Config {
    const homeDir = overrides.homeDir ? path.resolve(overrides.homeDir) : homeDirResolve(env);
    const configDir = path.resolve(overrides.configDir ?? envValue(env, "WRAPKIT_CONFIG_DIR") ?? configDirDefault(env, homeDir));
    const binDir = path.resolve(overrides.binDir ?? envValue(env, "WRAPKIT_BIN_DIR") ?? path.join(homeDir, "bin"));
    const searchPath = (env.PATH ?? "")
        .split(path.delimiter)
        .filter((entry) => entry.length > 0);

    return freezeDeep({
        configDir,
        homeDir,
        binDir,
        profilesDir: path.join(configDir, "profiles"),
        prefsDir: path.join(configDir, "prefs"),
        locksDir: path.join(configDir, "locks"),
        scriptsDir: path.join(configDir, "scripts"),
        aliasesPath: path.join(configDir, "aliases"),
        blocklistPath: path.join(configDir, "blocklist"),
        activeProfilePath: path.join(configDir, "active-profile"),
        hookTimeoutMs: overrides.hookTimeoutMs ?? positiveIntParse(envValue(env, "WRAPKIT_HOOK_TIMEOUT_MS")) ?? DEFAULT_HOOK_TIMEOUT_MS,
        promptTimeoutMs:
            overrides.promptTimeoutMs ??
            positiveIntParse(envValue(env, "WRAPKIT_PROMPT_TIMEOUT_MS")) ??
            DEFAULT_PROMPT_TIMEOUT_MS,
        batch: {
            windowMs: overrides.batch?.windowMs ?? DEFAULT_BATCH_WINDOW_MS,
            cooldownMs: overrides.batch?.cooldownMs ?? DEFAULT_BATCH_COOLDOWN_MS
        },
        packageRuntime: {
            command: envValue(env, "WRAPKIT_PACKAGE_RUNTIME") ?? DEFAULT_PACKAGE_RUNTIME,
            argsPrefix: ["run"]
        },
        watchPaths: overrides.watchPaths ?? packageExportPathsResolve(homeDir),
        searchPath
    });
}

function configDirDefault(env: NodeJS.ProcessEnv, homeDir: string): string {
    const xdg = envValue(env, "XDG_CONFIG_HOME");
    if (xdg && path.isAbsolute(xdg)) {
        return path.join(xdg, APP_DIR_NAME);
    }
    return path.join(homeDir, ".config", APP_DIR_NAME);
}

function positiveIntParse(value: string | null): number | null {
    if (!value || !/^\d+$/.test(value)) {
        return null;
    }
    const parsed = Number.parseInt(value, 10);
    return parsed > 0 ? parsed : null;
}

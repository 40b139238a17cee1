import type { Config } from "@/types";
import { configResolve } from "../config/configResolve.js";
import { ConfigStore } from "../preferences/configStore.js";
import { safetyAssert } from "../safety/safetyAssert.js";
import { validatePathWithinHome } from "../safety/validatePathWithinHome.js";

export type CommandContext = {
    config: Config;
    store: ConfigStore;
};

/**
 * Resolves configuration from the environment and opens an initialized store.
 * The wrapper directory must lie within the home directory.
 */
export async function commandContextCreate(env: NodeJS.ProcessEnv = process.env): Promise<CommandContext> {
    const config = configResolve(env);
    safetyAssert(await validatePathWithinHome(config.binDir, config.homeDir), config.binDir);
    const store = new ConfigStore(config);
    await store.init();
    return { config, store };
}

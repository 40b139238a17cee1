import { AliasStore } from "../alias/aliasStore.js";
import { HookExecutor } from "../hooks/hookExecutor.js";
import { LaunchEngine } from "../launch/launchEngine.js";
import { launchProcessRun } from "../launch/launchProcessRun.js";
import type { FailureMode, LaunchChoice } from "../preferences/preferenceTypes.js";
import { commandContextCreate } from "./commandContextCreate.js";
import { launchChoicePrompt } from "./launchChoicePrompt.js";

export type LaunchCommandOptions = {
    interactive?: boolean;
    desktop?: boolean;
    choice?: LaunchChoice;
    hookFailure?: FailureMode;
};

export async function launchCommand(name: string, args: string[], options: LaunchCommandOptions): Promise<void> {
    const { config, store } = await commandContextCreate();
    const engine = new LaunchEngine({
        store,
        aliases: new AliasStore(store),
        hooks: new HookExecutor({ timeoutMs: config.hookTimeoutMs, env: process.env }),
        prompt: launchChoicePrompt(config.promptTimeoutMs),
        executor: (decision) => launchProcessRun(decision, config.packageRuntime)
    });
    const result = await engine.launch({
        wrapperName: name,
        args,
        forceInteractive: options.interactive,
        forceDesktop: options.desktop,
        launchChoice: options.choice,
        failureModeOverride: options.hookFailure,
        source: options.desktop ? "desktop" : "cli",
        stdinIsTTY: process.stdin.isTTY === true,
        stdoutIsTTY: process.stdout.isTTY === true,
        env: process.env
    });
    process.exitCode = result.exitCode;
}

import path from "node:path";

import type { AliasStore } from "../alias/aliasStore.js";
import { WrapkitError } from "../errors/wrapkitError.js";
import { type HookExecutor, hookOutcomeExitCode } from "../hooks/hookExecutor.js";
import { hookFailureModeEnvRead } from "../hooks/hookFailureModeEnvRead.js";
import type { HookContext, LaunchSource } from "../hooks/hookTypes.js";
import { getLogger } from "../log.js";
import type { ConfigStore } from "../preferences/configStore.js";
import type { AppSettings, LaunchChoice } from "../preferences/preferenceTypes.js";
import { safetyAssert } from "../safety/safetyAssert.js";
import { validateIdentifierFormat } from "../safety/validateIdentifierFormat.js";
import { validatePackageId } from "../safety/validatePackageId.js";
import { wrapperRegistryRead } from "../wrappers/wrapperRegistryRead.js";
import { interactivityResolve } from "./interactivityResolve.js";
import { launchSystemBinaryFind } from "./launchSystemBinaryFind.js";
import type {
    LaunchCandidates,
    LaunchDecision,
    LaunchExecutor,
    LaunchRequest,
    LaunchResult,
    LaunchState,
    PreferencePrompt
} from "./launchTypes.js";

const logger = getLogger("launch.engine");

export type LaunchEngineOptions = {
    store: ConfigStore;
    aliases: AliasStore;
    hooks: HookExecutor;
    prompt: PreferencePrompt;
    executor: LaunchExecutor;
};

/**
 * Decides what a wrapper invocation runs and drives it through hooks and execution.
 * Bypass (non-interactive) launches read no preferences and run no hooks.
 */
export class LaunchEngine {
    private readonly store: ConfigStore;
    private readonly aliases: AliasStore;
    private readonly hooks: HookExecutor;
    private readonly prompt: PreferencePrompt;
    private readonly executor: LaunchExecutor;

    constructor(options: LaunchEngineOptions) {
        this.store = options.store;
        this.aliases = options.aliases;
        this.hooks = options.hooks;
        this.prompt = options.prompt;
        this.executor = options.executor;
    }

    async launch(request: LaunchRequest): Promise<LaunchResult> {
        const states: LaunchState[] = ["START"];
        const blocklist = await this.store.blocklistRead();
        safetyAssert(validateIdentifierFormat(request.wrapperName, blocklist), request.wrapperName);
        const appName = (await this.aliases.resolve(request.wrapperName)).target;
        if (appName !== request.wrapperName) {
            safetyAssert(validateIdentifierFormat(appName, blocklist), appName);
        }

        states.push("INTERACTIVITY_CHECK");
        const interactive = interactivityResolve(request);
        const candidates = await this.candidatesFind(request.wrapperName, appName);
        logger.debug(
            { wrapper: request.wrapperName, app: appName, interactive, ...candidates },
            "launch candidates"
        );

        if (!interactive) {
            states.push("BYPASS");
            const decision = this.decisionBuild(
                appName,
                this.bypassChoice(appName, candidates, request.launchChoice ?? null),
                candidates,
                request.args,
                envRecord(request.env)
            );
            states.push("EXECUTE");
            const exitCode = await this.executor(decision);
            states.push("DONE");
            return { ok: true, exitCode, decision, states, preHook: null, postHook: null };
        }

        states.push("RESOLVE_TARGET");
        const app = await this.store.load(appName);
        const choice = await this.interactiveChoice(app, candidates, request.launchChoice ?? null);
        const { settings, layers } = app;
        const decision = this.decisionBuild(
            appName,
            choice,
            candidates,
            [...settings.customArgs, ...request.args],
            { ...envRecord(request.env), ...settings.envOverrides }
        );

        const source: LaunchSource = request.source ?? "interactive";
        const context: HookContext = {
            wrapperName: request.wrapperName,
            targetId: decision.target,
            source,
            envOverrides: settings.envOverrides
        };
        const envMode = hookFailureModeEnvRead(request.env);

        states.push("PRE_HOOK");
        const preHook = await this.hooks.run("pre", settings.preLaunchScript, context, {
            runtime: request.failureModeOverride,
            env: envMode,
            app: layers.app.preFailureMode,
            global: layers.global.preFailureMode
        });
        if (preHook.aborted) {
            states.push("DONE");
            logger.info({ app: appName, exitCode: preHook.exitCode }, "launch aborted by pre-launch hook");
            return { ok: false, exitCode: hookOutcomeExitCode(preHook), decision, states, preHook, postHook: null };
        }

        states.push("EXECUTE");
        const appExitCode = await this.executor(decision);

        states.push("POST_HOOK");
        const postHook = await this.hooks.run(
            "post",
            settings.postLaunchScript,
            { ...context, appExitCode },
            {
                runtime: request.failureModeOverride,
                env: envMode,
                app: layers.app.postFailureMode,
                global: layers.global.postFailureMode
            }
        );
        states.push("DONE");

        if (postHook.failure && postHook.failureMode === "abort") {
            return { ok: false, exitCode: hookOutcomeExitCode(postHook), decision, states, preHook, postHook };
        }
        return { ok: true, exitCode: appExitCode, decision, states, preHook, postHook };
    }

    private async candidatesFind(wrapperName: string, appName: string): Promise<LaunchCandidates> {
        const { binDir, searchPath } = this.store.config;
        const registry = await wrapperRegistryRead(binDir);
        const registered = registry.get(appName) ?? null;
        const packageId = registered ?? (validatePackageId(appName).ok ? appName : null);
        const excluded = [path.join(binDir, wrapperName), path.join(binDir, appName)];
        const systemPath = await launchSystemBinaryFind(appName, searchPath, excluded);
        return { systemPath, packageId };
    }

    private bypassChoice(appName: string, candidates: LaunchCandidates, oneShot: LaunchChoice | null): LaunchChoice {
        if (oneShot === "package" && candidates.packageId) {
            return "package";
        }
        if (candidates.systemPath) {
            return "system";
        }
        if (candidates.packageId) {
            return "package";
        }
        throw noTargetError(appName);
    }

    /**
     * One-shot choice, then the preference record, then the configured method.
     * `auto` with both targets and no record asks once and records the answer.
     */
    private async interactiveChoice(
        app: AppSettings,
        candidates: LaunchCandidates,
        oneShot: LaunchChoice | null
    ): Promise<LaunchChoice> {
        const { appName } = app;
        const { systemPath, packageId } = candidates;
        if (!systemPath && !packageId) {
            throw noTargetError(appName);
        }

        if (oneShot) {
            return availableChoice(oneShot, candidates);
        }

        const recorded = app.layers.preference;
        if (recorded) {
            const choice = availableChoice(recorded, candidates);
            if (choice !== recorded && recorded === "system") {
                logger.warn({ app: appName }, "system binary is gone; preference switched to package");
                await this.store.preferenceWrite(appName, "package");
            }
            return choice;
        }

        const method = app.settings.launchMethod;
        if (method !== "auto") {
            return availableChoice(method, candidates);
        }
        if (!systemPath || !packageId) {
            return systemPath ? "system" : "package";
        }

        const answer = (await this.prompt({ appName, systemPath, packageId })) ?? "system";
        await this.store.preferenceWrite(appName, answer);
        return answer;
    }

    private decisionBuild(
        appName: string,
        choice: LaunchChoice,
        candidates: LaunchCandidates,
        args: string[],
        env: Record<string, string>
    ): LaunchDecision {
        const target = choice === "system" ? candidates.systemPath : candidates.packageId;
        if (!target) {
            throw noTargetError(appName);
        }
        return { targetKind: choice, target, args, env };
    }
}

function availableChoice(preferred: LaunchChoice, candidates: LaunchCandidates): LaunchChoice {
    if (preferred === "system") {
        return candidates.systemPath ? "system" : "package";
    }
    return candidates.packageId ? "package" : "system";
}

function noTargetError(appName: string): WrapkitError {
    return new WrapkitError("launch", "No system binary or package found.", { input: appName });
}

function envRecord(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

export { AliasStore } from "./alias/aliasStore.js";
export { aliasCreatePlan } from "./alias/aliasCreatePlan.js";
export { aliasResolve } from "./alias/aliasResolve.js";
export { configResolve } from "./config/configResolve.js";
export { AliasResolutionError } from "./errors/aliasResolutionError.js";
export { ConfigError } from "./errors/configError.js";
export { errorDiagnosticFormat } from "./errors/errorDiagnosticFormat.js";
export { HookFailure } from "./errors/hookFailure.js";
export { LockContentionError } from "./errors/lockContentionError.js";
export { ValidationError } from "./errors/validationError.js";
export { WrapkitError } from "./errors/wrapkitError.js";
export { EventBatcher } from "./events/eventBatcher.js";
export { RegenerationMonitor } from "./events/regenerationMonitor.js";
export { HookExecutor, hookOutcomeExitCode } from "./hooks/hookExecutor.js";
export { hookFailureModeResolve } from "./hooks/hookFailureModeResolve.js";
export { interactivityResolve } from "./launch/interactivityResolve.js";
export { LaunchEngine } from "./launch/launchEngine.js";
export type { LaunchExecutor, PreferencePrompt } from "./launch/launchTypes.js";
export { ConfigLock } from "./lock/configLock.js";
export { ConfigStore, type SaveTarget } from "./preferences/configStore.js";
export { validateExecutableCandidate } from "./safety/validateExecutableCandidate.js";
export { validateIdentifierFormat } from "./safety/validateIdentifierFormat.js";
export { validatePathWithinHome } from "./safety/validatePathWithinHome.js";
export { wrapperNameFromPackageId } from "./wrappers/wrapperNameFromPackageId.js";
export { wrapperRegistryRead } from "./wrappers/wrapperRegistryRead.js";
export { wrapperScriptBuild } from "./wrappers/wrapperScriptBuild.js";
export type * from "./types.js";

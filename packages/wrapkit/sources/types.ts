// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Config
export type { BatchTiming, Config, ConfigOverrides, PackageRuntime } from "./config/configTypes.js";
// Preferences
export type {
    AppSettings,
    FailureMode,
    LaunchChoice,
    LaunchMethod,
    PermissionPreset,
    ResolvedSettings,
    SettingsLayer,
    SettingsLayers
} from "./preferences/preferenceTypes.js";
// Hooks
export type { FailureModeChain, HookContext, HookKind, HookOutcome, LaunchSource } from "./hooks/hookTypes.js";
// Aliases
export type { AliasRecord } from "./alias/aliasTypes.js";
// Launch
export type { LaunchDecision, LaunchRequest, LaunchResult, LaunchState, TargetKind } from "./launch/launchTypes.js";
// Events
export type { ChangeType, EventBatchEntry } from "./events/eventTypes.js";

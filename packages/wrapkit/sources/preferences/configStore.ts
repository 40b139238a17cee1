import { promises as fs } from "node:fs";
import path from "node:path";

import type { Config } from "@/types";
import { ConfigError } from "../errors/configError.js";
import { LockContentionError } from "../errors/lockContentionError.js";
import { ValidationError } from "../errors/validationError.js";
import { ConfigLock } from "../lock/configLock.js";
import { getLogger } from "../log.js";
import { HOOK_SCRIPT_FILE_NAMES, PROFILE_DEFAULT_NAME } from "../paths.js";
import { safetyAssert } from "../safety/safetyAssert.js";
import { validateExecutableCandidate } from "../safety/validateExecutableCandidate.js";
import { validateIdentifierFormat } from "../safety/validateIdentifierFormat.js";
import { validateIdentifierSyntax } from "../safety/validateIdentifierSyntax.js";
import { validatePathWithinHome } from "../safety/validatePathWithinHome.js";
import { validatePermissionFlag } from "../safety/validatePermissionFlag.js";
import { atomicWrite } from "../util/atomicWrite.js";
import { errorCodeIs, lineFileRead } from "../util/lineFileRead.js";
import { lineFileWrite } from "../util/lineFileWrite.js";
import { pathExpandHome } from "../util/pathExpandHome.js";
import { zodIssuesFormat } from "../util/zodIssuesFormat.js";
import { appBlockParse } from "./appBlockParse.js";
import { preferenceBlockToLayer } from "./preferenceBlockToLayer.js";
import { preferenceRecordRead } from "./preferenceRecordRead.js";
import { preferenceRecordWrite } from "./preferenceRecordWrite.js";
import {
    type AppSettings,
    type LaunchChoice,
    type PermissionPreset,
    type ResolvedSettings,
    type SettingsLayer,
    launchChoiceIs
} from "./preferenceTypes.js";
import { presetBuiltins } from "./presetBuiltins.js";
import { presetNameValidate } from "./presetNameValidate.js";
import { profileDocumentParse, profileDocumentRead, profileDocumentSerialize } from "./profileDocumentRead.js";
import {
    type PreferenceKey,
    type ProfileDocument,
    preferenceBlockSchema,
    profileDocumentEmpty
} from "./profileDocumentSchema.js";
import { profileDocumentValidate, scriptPathValidate } from "./profileDocumentValidate.js";
import { profileNameValidate } from "./profileNameValidate.js";
import { settingsDefaults } from "./settingsDefaults.js";
import { settingsMerge } from "./settingsMerge.js";

const logger = getLogger("config.store");

export type SaveTarget = { layer: "global" } | { layer: "app"; app: string } | { layer: "preference"; app: string };

/**
 * Layered configuration backed by per-profile JSON documents under configDir.
 * Reads never take the lock; every mutation does and fails fast on contention.
 */
export class ConfigStore {
    readonly config: Config;
    readonly lock: ConfigLock;
    activeProfileName: string = PROFILE_DEFAULT_NAME;

    constructor(config: Config) {
        this.config = config;
        this.lock = new ConfigLock(config.locksDir);
    }

    /**
     * Reads the active-profile pointer and creates the default profile on first run.
     * Lock contention while creating the default profile is not fatal to reads.
     */
    async init(): Promise<void> {
        this.activeProfileName = await this.activePointerRead();
        if (await this.profileExists(PROFILE_DEFAULT_NAME)) {
            return;
        }
        try {
            await this.lock.inLock(async () => {
                if (!(await this.profileExists(PROFILE_DEFAULT_NAME))) {
                    await this.profileWrite(PROFILE_DEFAULT_NAME, profileDocumentEmpty());
                    logger.info({ profile: PROFILE_DEFAULT_NAME }, "created default profile");
                }
            });
        } catch (error) {
            if (!(error instanceof LockContentionError)) {
                throw error;
            }
            logger.debug({ lock: error.lockPath }, "default profile creation skipped; lock held");
        }
    }

    /**
     * Merges built-in defaults, the active profile's global and app blocks and the preference record.
     * A malformed layer is skipped with a warning; the next lower layer applies.
     */
    async load(appName: string): Promise<AppSettings> {
        safetyAssert(validateIdentifierSyntax(appName), appName);
        const profileName = this.activeProfileName;
        return this.loadFrom(profileName, await this.profileReadLenient(profileName), appName);
    }

    async resolve(appName: string): Promise<ResolvedSettings> {
        return (await this.load(appName)).settings;
    }

    /**
     * Resolves every app declared in a profile (the active one by default).
     */
    async loadProfile(profileName: string = this.activeProfileName): Promise<Map<string, ResolvedSettings>> {
        profileNameValidate(profileName);
        const document = await this.profileReadStrict(profileName);
        const result = new Map<string, ResolvedSettings>();
        for (const appName of Object.keys(document.app_preferences).sort()) {
            if (!validateIdentifierSyntax(appName).ok) {
                logger.warn({ app: JSON.stringify(appName.slice(0, 40)) }, "app block with unsafe name ignored");
                continue;
            }
            result.set(appName, (await this.loadFrom(profileName, document, appName)).settings);
        }
        return result;
    }

    async listProfiles(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.config.profilesDir);
        } catch (error) {
            if (!errorCodeIs(error, "ENOENT")) {
                throw error;
            }
            entries = [];
        }
        const names = new Set<string>([PROFILE_DEFAULT_NAME]);
        for (const entry of entries) {
            if (!entry.endsWith(".json")) {
                continue;
            }
            const name = entry.slice(0, -".json".length);
            try {
                profileNameValidate(name);
                names.add(name);
            } catch {
                logger.debug({ entry }, "skipping profile file with unsupported name");
            }
        }
        return [...names].sort();
    }

    async createProfile(name: string, copyFrom?: string): Promise<void> {
        profileNameValidate(name);
        if (name === PROFILE_DEFAULT_NAME) {
            throw new ValidationError("REJECTED", "The default profile always exists.", { input: name });
        }
        if (copyFrom !== undefined) {
            profileNameValidate(copyFrom);
        }
        await this.lock.inLock(async () => {
            if (await this.profileExists(name)) {
                throw new ValidationError("REJECTED", "Profile already exists.", { input: name });
            }
            let document = profileDocumentEmpty();
            if (copyFrom !== undefined) {
                if (!(await this.profileExists(copyFrom)) && copyFrom !== PROFILE_DEFAULT_NAME) {
                    throw new ConfigError("Source profile does not exist.", { input: copyFrom });
                }
                document = await this.profileReadStrict(copyFrom);
            }
            await this.profileWrite(name, document);
        });
        logger.info({ profile: name, copyFrom }, "profile created");
    }

    /**
     * Switches the active profile. The pointer is replaced atomically; on failure nothing changes.
     */
    async setActiveProfile(name: string): Promise<void> {
        profileNameValidate(name);
        await this.lock.inLock(async () => {
            if (name !== PROFILE_DEFAULT_NAME && !(await this.profileExists(name))) {
                throw new ConfigError("Profile does not exist.", { input: name });
            }
            await atomicWrite(this.config.activeProfilePath, `${name}\n`, 0o644);
        });
        this.activeProfileName = name;
        logger.info({ profile: name }, "active profile switched");
    }

    async exportProfile(name: string, destPath: string): Promise<void> {
        profileNameValidate(name);
        if (name !== PROFILE_DEFAULT_NAME && !(await this.profileExists(name))) {
            throw new ConfigError("Profile does not exist.", { input: name });
        }
        safetyAssert(await validatePathWithinHome(destPath, this.config.homeDir), destPath);
        const document = await this.profileReadStrict(name);
        await atomicWrite(pathExpandHome(destPath, this.config.homeDir), profileDocumentSerialize(document), 0o644);
    }

    /**
     * Imports a document under a new name after migrating it and running every safety check.
     */
    async importProfile(name: string, srcPath: string): Promise<void> {
        profileNameValidate(name);
        if (name === PROFILE_DEFAULT_NAME) {
            throw new ValidationError("REJECTED", "The default profile cannot be replaced by import.", { input: name });
        }
        let content: string;
        try {
            content = await fs.readFile(pathExpandHome(srcPath, this.config.homeDir), "utf8");
        } catch (error) {
            throw new ConfigError("Import source could not be read.", { input: srcPath, cause: error });
        }
        const { document } = profileDocumentParse(content, srcPath);
        await profileDocumentValidate(document, {
            homeDir: this.config.homeDir,
            blocklist: await this.blocklistRead()
        });
        await this.lock.inLock(async () => {
            if (await this.profileExists(name)) {
                throw new ValidationError("REJECTED", "Profile already exists.", { input: name });
            }
            await this.profileWrite(name, document);
        });
        logger.info({ profile: name }, "profile imported");
    }

    /**
     * Sets (or, with value undefined, clears) one key in the global block, an app block
     * or the app's preference record. Values are schema-checked; scripts pass the path checks.
     */
    async save(target: SaveTarget, key: PreferenceKey, value: unknown): Promise<void> {
        if (target.layer === "preference") {
            if (key !== "launch_method" || !launchChoiceIs(value)) {
                throw new ValidationError("REJECTED", "Preference records only hold launch_method system or package.", {
                    input: String(value)
                });
            }
            await this.preferenceWrite(target.app, value);
            return;
        }
        if (target.layer === "app") {
            safetyAssert(validateIdentifierFormat(target.app, await this.blocklistRead()), target.app);
        }

        let stored = value;
        if ((key === "pre_launch_script" || key === "post_launch_script") && typeof value === "string") {
            stored = await this.scriptValidateForSave(value);
        }

        await this.lock.inLock(async () => {
            const profileName = this.activeProfileName;
            const document = await this.profileReadStrict(profileName);
            const current = target.layer === "global" ? document.global_preferences : appBlockParse(document, target.app) ?? {};
            const next: Record<string, unknown> = { ...current };
            if (stored === undefined) {
                delete next[key];
            } else {
                next[key] = stored;
            }
            const parsed = preferenceBlockSchema.safeParse(next);
            if (!parsed.success) {
                throw new ValidationError("REJECTED", `Invalid value for ${key}: ${zodIssuesFormat(parsed.error)}`, {
                    input: JSON.stringify(value) ?? "undefined"
                });
            }
            if (target.layer === "global") {
                document.global_preferences = parsed.data;
            } else {
                document.app_preferences[target.app] = parsed.data;
            }
            await this.profileWrite(profileName, document);
        });
        logger.debug({ layer: target.layer, key }, "preference saved");
    }

    async preferenceRead(appName: string): Promise<LaunchChoice | null> {
        return preferenceRecordRead(this.config.prefsDir, appName);
    }

    async preferenceWrite(appName: string, choice: LaunchChoice): Promise<void> {
        safetyAssert(validateIdentifierFormat(appName, await this.blocklistRead()), appName);
        await this.lock.inLock(() => preferenceRecordWrite(this.config.prefsDir, appName, choice));
        logger.info({ app: appName, choice }, "preference recorded");
    }

    /**
     * Built-in presets overlaid by the active profile's presets of the same name.
     */
    async presetList(): Promise<PermissionPreset[]> {
        const document = await this.profileReadLenient(this.activeProfileName);
        const presets = new Map<string, PermissionPreset>();
        for (const [name, permissions] of Object.entries(presetBuiltins())) {
            presets.set(name, { name, permissions: [...permissions], source: "builtin" });
        }
        for (const [name, preset] of Object.entries(document.permission_presets)) {
            presets.set(name, { name, permissions: [...preset.permissions], source: "user" });
        }
        return [...presets.values()].sort((a, b) => a.name.localeCompare(b.name));
    }

    async presetGet(name: string): Promise<PermissionPreset | null> {
        const presets = await this.presetList();
        return presets.find((preset) => preset.name === name) ?? null;
    }

    async presetSet(name: string, permissions: string[]): Promise<void> {
        presetNameValidate(name);
        for (const flag of permissions) {
            safetyAssert(validatePermissionFlag(flag), flag);
        }
        await this.lock.inLock(async () => {
            const document = await this.profileReadStrict(this.activeProfileName);
            document.permission_presets[name] = { permissions: [...permissions] };
            await this.profileWrite(this.activeProfileName, document);
        });
    }

    /**
     * Removes a user preset. Built-in presets cannot be removed.
     * Returns false when the active profile had no such preset.
     */
    async presetRemove(name: string): Promise<boolean> {
        presetNameValidate(name);
        return this.lock.inLock(async () => {
            const document = await this.profileReadStrict(this.activeProfileName);
            if (!Object.prototype.hasOwnProperty.call(document.permission_presets, name)) {
                if (Object.prototype.hasOwnProperty.call(presetBuiltins(), name)) {
                    throw new ValidationError("REJECTED", "Built-in presets cannot be removed.", { input: name });
                }
                return false;
            }
            delete document.permission_presets[name];
            await this.profileWrite(this.activeProfileName, document);
            return true;
        });
    }

    async blocklistRead(): Promise<string[]> {
        const entries = await lineFileRead(this.config.blocklistPath);
        return entries.filter((entry) => validateIdentifierSyntax(entry).ok);
    }

    async blocklistAdd(identifier: string): Promise<boolean> {
        safetyAssert(validateIdentifierSyntax(identifier), identifier);
        return this.lock.inLock(async () => {
            const entries = await this.blocklistRead();
            if (entries.includes(identifier)) {
                return false;
            }
            await lineFileWrite(this.config.blocklistPath, [...entries, identifier]);
            return true;
        });
    }

    async blocklistRemove(identifier: string): Promise<boolean> {
        return this.lock.inLock(async () => {
            const entries = await this.blocklistRead();
            if (!entries.includes(identifier)) {
                return false;
            }
            await lineFileWrite(
                this.config.blocklistPath,
                entries.filter((entry) => entry !== identifier)
            );
            return true;
        });
    }

    /**
     * Rewrites every profile stored with an older schema. Returns the migrated profile names.
     */
    async migrate(): Promise<string[]> {
        return this.lock.inLock(async () => {
            const migrated: string[] = [];
            for (const name of await this.listProfiles()) {
                const loaded = await profileDocumentRead(this.profilePath(name));
                if (loaded?.migrated) {
                    await this.profileWrite(name, loaded.document);
                    migrated.push(name);
                }
            }
            if (migrated.length > 0) {
                logger.info({ profiles: migrated }, "profiles migrated");
            }
            return migrated;
        });
    }

    profilePath(name: string): string {
        return path.join(this.config.profilesDir, `${name}.json`);
    }

    private async profileExists(name: string): Promise<boolean> {
        try {
            const stats = await fs.stat(this.profilePath(name));
            return stats.isFile();
        } catch (error) {
            if (errorCodeIs(error, "ENOENT")) {
                return false;
            }
            throw error;
        }
    }

    /**
     * Strict read used by mutations: a malformed document must not be overwritten.
     */
    private async profileReadStrict(name: string): Promise<ProfileDocument> {
        const loaded = await profileDocumentRead(this.profilePath(name));
        if (loaded) {
            return loaded.document;
        }
        if (name === PROFILE_DEFAULT_NAME) {
            return profileDocumentEmpty();
        }
        throw new ConfigError("Profile does not exist.", { input: name });
    }

    /**
     * Lenient read used by launches: a missing or malformed document falls back to built-in defaults.
     */
    private async profileReadLenient(name: string): Promise<ProfileDocument> {
        try {
            const loaded = await profileDocumentRead(this.profilePath(name));
            return loaded?.document ?? profileDocumentEmpty();
        } catch (error) {
            if (!(error instanceof ConfigError)) {
                throw error;
            }
            logger.warn({ profile: name, error: error.message }, "profile unusable; using built-in defaults");
            return profileDocumentEmpty();
        }
    }

    private async profileWrite(name: string, document: ProfileDocument): Promise<void> {
        await atomicWrite(this.profilePath(name), profileDocumentSerialize(document), 0o644);
    }

    private async activePointerRead(): Promise<string> {
        const [name] = await lineFileRead(this.config.activeProfilePath);
        if (name === undefined || name === PROFILE_DEFAULT_NAME) {
            return PROFILE_DEFAULT_NAME;
        }
        try {
            profileNameValidate(name);
        } catch {
            logger.warn({ value: JSON.stringify(name.slice(0, 40)) }, "active profile pointer invalid; using default");
            return PROFILE_DEFAULT_NAME;
        }
        if (!(await this.profileExists(name))) {
            logger.warn({ profile: name }, "active profile missing; using default");
            return PROFILE_DEFAULT_NAME;
        }
        return name;
    }

    private async loadFrom(profileName: string, document: ProfileDocument, appName: string): Promise<AppSettings> {
        const global = preferenceBlockToLayer(document.global_preferences);
        let app: SettingsLayer = {};
        try {
            const block = appBlockParse(document, appName);
            app = block ? preferenceBlockToLayer(block) : {};
        } catch (error) {
            if (!(error instanceof ConfigError)) {
                throw error;
            }
            logger.warn({ app: appName, profile: profileName, error: error.message }, "app block ignored");
        }
        const preference = await preferenceRecordRead(this.config.prefsDir, appName);

        const merged = settingsMerge(settingsDefaults(), [
            global,
            app,
            preference ? { launchMethod: preference } : {}
        ]);
        const settings: ResolvedSettings = {
            ...merged,
            preLaunchScript: await this.scriptResolve(appName, "pre", merged.preLaunchScript, [global, app]),
            postLaunchScript: await this.scriptResolve(appName, "post", merged.postLaunchScript, [global, app])
        };

        return {
            appName,
            profileName,
            settings,
            layers: { global, app, preference }
        };
    }

    private async scriptValidateForSave(script: string): Promise<string> {
        const expanded = await scriptPathValidate(script, this.config.homeDir);
        safetyAssert(await validateExecutableCandidate(expanded), script);
        return expanded;
    }

    /**
     * Keeps a resolved script only if it passes the safety checks now.
     * When no layer declares the script, the conventional per-wrapper location is used.
     */
    private async scriptResolve(
        appName: string,
        kind: "pre" | "post",
        script: string | null,
        layers: SettingsLayer[]
    ): Promise<string | null> {
        const field = kind === "pre" ? "preLaunchScript" : "postLaunchScript";
        const declared = layers.some((layer) => layer[field] !== undefined);
        const candidate = declared ? script : path.join(this.config.scriptsDir, appName, HOOK_SCRIPT_FILE_NAMES[kind]);
        if (candidate === null) {
            return null;
        }
        const expanded = pathExpandHome(candidate, this.config.homeDir);
        const within = await validatePathWithinHome(expanded, this.config.homeDir);
        if (!within.ok) {
            logger.warn({ app: appName, hook: kind, reason: within.reason }, "hook script rejected");
            return null;
        }
        const executable = await validateExecutableCandidate(expanded, { executable: true });
        if (!executable.ok) {
            if (declared) {
                logger.debug({ app: appName, hook: kind, reason: executable.reason }, "hook script unavailable");
            }
            return null;
        }
        return expanded;
    }
}

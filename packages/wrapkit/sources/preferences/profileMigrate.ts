import { ConfigError } from "../errors/configError.js";
import { isRecord } from "../util/isRecord.js";
import { PROFILE_SCHEMA_VERSION } from "./profileDocumentSchema.js";
import { failureModeIs } from "./preferenceTypes.js";

export type ProfileMigration = {
    document: Record<string, unknown>;
    fromVersion: number;
    migrated: boolean;
};

/**
 * Upgrades a raw profile document to the current schema version.
 * Only adds fields; every existing key and value is carried over. Idempotent.
 */
export function profileMigrate(raw: unknown, filePath?: string): ProfileMigration {
    if (!isRecord(raw)) {
        throw new ConfigError("Profile document must be an object.", { filePath });
    }
    const version = raw.schema_version === undefined ? 1 : raw.schema_version;
    if (typeof version !== "number" || !Number.isInteger(version) || version < 1) {
        throw new ConfigError("Profile schema_version must be a positive integer.", { filePath });
    }
    if (version > PROFILE_SCHEMA_VERSION) {
        throw new ConfigError(
            `Profile schema_version ${version} is newer than supported version ${PROFILE_SCHEMA_VERSION}.`,
            { filePath }
        );
    }
    if (version === PROFILE_SCHEMA_VERSION) {
        return { document: raw, fromVersion: version, migrated: false };
    }

    return { document: migrateV1ToV2(raw), fromVersion: version, migrated: true };
}

function migrateV1ToV2(raw: Record<string, unknown>): Record<string, unknown> {
    const document: Record<string, unknown> = { ...raw, schema_version: 2 };
    const legacyMode = failureModeIs(raw.hook_failure_mode_default) ? raw.hook_failure_mode_default : "warn";

    if (raw.global_preferences === undefined) {
        document.global_preferences = {};
    }
    if (isRecord(document.global_preferences)) {
        const global = { ...document.global_preferences };
        global.pre_launch_failure_mode ??= legacyMode;
        global.post_launch_failure_mode ??= legacyMode;
        document.global_preferences = global;
    }
    document.app_preferences ??= {};
    document.permission_presets ??= {};
    return document;
}

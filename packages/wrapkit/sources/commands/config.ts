import { ValidationError } from "../errors/validationError.js";
import { preferenceValueParse } from "../preferences/preferenceValueParse.js";
import { PREFERENCE_KEYS, type PreferenceKey } from "../preferences/profileDocumentSchema.js";
import { commandContextCreate } from "./commandContextCreate.js";

export async function configShowCommand(appName: string): Promise<void> {
    const { store } = await commandContextCreate();
    const app = await store.load(appName);
    console.log(
        JSON.stringify(
            {
                app: app.appName,
                profile: app.profileName,
                preference: app.layers.preference,
                settings: app.settings
            },
            null,
            4
        )
    );
}

export async function configSetCommand(key: string, value: string, options: { app?: string }): Promise<void> {
    const preferenceKey = preferenceKeyParse(key);
    const { store } = await commandContextCreate();
    const target = options.app ? { layer: "app" as const, app: options.app } : { layer: "global" as const };
    await store.save(target, preferenceKey, preferenceValueParse(preferenceKey, value));
    console.log(`${key} updated${options.app ? ` for ${options.app}` : ""}.`);
}

export async function configMigrateCommand(): Promise<void> {
    const { store } = await commandContextCreate();
    const migrated = await store.migrate();
    console.log(migrated.length === 0 ? "All profiles are current." : `Migrated: ${migrated.join(", ")}`);
}

function preferenceKeyParse(key: string): PreferenceKey {
    const found = PREFERENCE_KEYS.find((candidate) => candidate === key);
    if (!found) {
        throw new ValidationError("REJECTED", `Unknown key; expected one of ${PREFERENCE_KEYS.join(", ")}.`, {
            input: key
        });
    }
    return found;
}

import { ValidationError } from "../errors/validationError.js";
import { commandContextCreate } from "./commandContextCreate.js";

export async function presetListCommand(): Promise<void> {
    const { store } = await commandContextCreate();
    for (const preset of await store.presetList()) {
        console.log(`${preset.name} (${preset.source}): ${preset.permissions.join(" ")}`);
    }
}

export async function presetShowCommand(name: string): Promise<void> {
    const { store } = await commandContextCreate();
    const preset = await store.presetGet(name);
    if (!preset) {
        throw new ValidationError("REJECTED", "No such preset.", { input: name });
    }
    for (const permission of preset.permissions) {
        console.log(permission);
    }
}

export async function presetSetCommand(name: string, permissions: string[]): Promise<void> {
    const { store } = await commandContextCreate();
    await store.presetSet(name, permissions);
    console.log(`Preset ${name} saved.`);
}

export async function presetRemoveCommand(name: string): Promise<void> {
    const { store } = await commandContextCreate();
    const removed = await store.presetRemove(name);
    console.log(removed ? `Preset ${name} removed.` : `No preset named ${name}.`);
}

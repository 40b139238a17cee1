import { AliasStore } from "../alias/aliasStore.js";
import { commandContextCreate } from "./commandContextCreate.js";

export async function aliasCommand(aliasName: string, targetName: string, options: { force?: boolean }): Promise<void> {
    const { store } = await commandContextCreate();
    const result = await new AliasStore(store).create(aliasName, targetName, { force: options.force });
    if (result.unchanged) {
        console.log(`Alias ${aliasName} -> ${targetName} already exists.`);
        return;
    }
    if (result.previousTarget !== null) {
        console.error(`[wrapkit] warning: alias ${aliasName} replaced (was -> ${result.previousTarget})`);
    }
    console.log(`Alias ${aliasName} -> ${targetName} created.`);
}

export async function unaliasCommand(aliasName: string): Promise<void> {
    const { store } = await commandContextCreate();
    const removed = await new AliasStore(store).remove(aliasName);
    console.log(removed ? `Alias ${aliasName} removed.` : `No alias named ${aliasName}.`);
}

export async function aliasesCommand(): Promise<void> {
    const { store } = await commandContextCreate();
    const records = await new AliasStore(store).list();
    for (const record of records) {
        console.log(`${record.aliasName} -> ${record.targetName}`);
    }
}

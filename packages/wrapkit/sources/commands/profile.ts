import { commandContextCreate } from "./commandContextCreate.js";

export async function profileListCommand(): Promise<void> {
    const { store } = await commandContextCreate();
    for (const name of await store.listProfiles()) {
        console.log(`${name === store.activeProfileName ? "*" : " "} ${name}`);
    }
}

export async function profileCurrentCommand(): Promise<void> {
    const { store } = await commandContextCreate();
    console.log(store.activeProfileName);
}

export async function profileCreateCommand(name: string, options: { from?: string }): Promise<void> {
    const { store } = await commandContextCreate();
    await store.createProfile(name, options.from);
    console.log(`Profile ${name} created.`);
}

export async function profileSwitchCommand(name: string): Promise<void> {
    const { store } = await commandContextCreate();
    await store.setActiveProfile(name);
    console.log(`Active profile: ${name}`);
}

export async function profileExportCommand(name: string, destPath: string): Promise<void> {
    const { store } = await commandContextCreate();
    await store.exportProfile(name, destPath);
    console.log(`Profile ${name} exported to ${destPath}.`);
}

export async function profileImportCommand(name: string, srcPath: string): Promise<void> {
    const { store } = await commandContextCreate();
    await store.importProfile(name, srcPath);
    console.log(`Profile ${name} imported.`);
}

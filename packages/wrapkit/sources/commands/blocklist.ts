import { commandContextCreate } from "./commandContextCreate.js";

export async function blockCommand(identifier: string): Promise<void> {
    const { store } = await commandContextCreate();
    const added = await store.blocklistAdd(identifier);
    console.log(added ? `${identifier} blocked.` : `${identifier} is already blocked.`);
}

export async function unblockCommand(identifier: string): Promise<void> {
    const { store } = await commandContextCreate();
    const removed = await store.blocklistRemove(identifier);
    console.log(removed ? `${identifier} unblocked.` : `${identifier} was not blocked.`);
}

export async function blockedCommand(): Promise<void> {
    const { store } = await commandContextCreate();
    for (const identifier of await store.blocklistRead()) {
        console.log(identifier);
    }
}

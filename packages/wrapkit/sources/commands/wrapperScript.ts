import { wrapperScriptBuild } from "../wrappers/wrapperScriptBuild.js";
import { commandContextCreate } from "./commandContextCreate.js";

export async function wrapperScriptCommand(name: string, packageId: string): Promise<void> {
    const { store } = await commandContextCreate();
    process.stdout.write(wrapperScriptBuild(name, packageId, await store.blocklistRead()));
}

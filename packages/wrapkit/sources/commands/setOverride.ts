import type { LaunchChoice } from "../preferences/preferenceTypes.js";
import { commandContextCreate } from "./commandContextCreate.js";

export async function setOverrideCommand(name: string, choice: LaunchChoice): Promise<void> {
    const { store } = await commandContextCreate();
    await store.save({ layer: "preference", app: name }, "launch_method", choice);
    console.log(`${name} will launch the ${choice === "system" ? "system binary" : "application package"}.`);
}

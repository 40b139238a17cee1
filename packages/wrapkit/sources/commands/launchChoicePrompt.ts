import type { PreferencePrompt } from "../launch/launchTypes.js";
import { promptSelect } from "./prompts.js";

/**
 * Asks which target to remember for an app. No answer within timeoutMs means system.
 */
export function launchChoicePrompt(timeoutMs: number): PreferencePrompt {
    return async ({ appName, systemPath, packageId }) => {
        const answer = await promptSelect({
            message: `How should "${appName}" launch from now on?`,
            choices: [
                { value: "system", name: "System binary", description: systemPath },
                { value: "package", name: "Application package", description: packageId }
            ],
            timeoutMs
        });
        return answer ?? "system";
    };
}

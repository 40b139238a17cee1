import { promises as fs } from "node:fs";

import { safetyAssert } from "../safety/safetyAssert.js";
import { validateExecutableCandidate } from "../safety/validateExecutableCandidate.js";
import { validateIdentifierFormat } from "../safety/validateIdentifierFormat.js";
import { validatePathWithinHome } from "../safety/validatePathWithinHome.js";
import { validatePermissionFlag } from "../safety/validatePermissionFlag.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { pathExpandHome } from "../util/pathExpandHome.js";
import { appBlockParse } from "./appBlockParse.js";
import type { PreferenceBlock, ProfileDocument } from "./profileDocumentSchema.js";
import { presetNameValidate } from "./presetNameValidate.js";

export type ProfileDocumentValidateOptions = {
    homeDir: string;
    blocklist: string[];
};

/**
 * Runs every safety check over a document before it is stored.
 * Throws ValidationError for unsafe names, paths or flags and ConfigError for malformed app blocks.
 */
export async function profileDocumentValidate(
    document: ProfileDocument,
    options: ProfileDocumentValidateOptions
): Promise<void> {
    await blockScriptsValidate(document.global_preferences, options.homeDir);

    for (const appName of Object.keys(document.app_preferences)) {
        safetyAssert(validateIdentifierFormat(appName, options.blocklist), appName);
        const block = appBlockParse(document, appName);
        if (block) {
            await blockScriptsValidate(block, options.homeDir);
        }
    }

    for (const [presetName, preset] of Object.entries(document.permission_presets)) {
        presetNameValidate(presetName);
        for (const flag of preset.permissions) {
            safetyAssert(validatePermissionFlag(flag), flag);
        }
    }
}

/**
 * Scripts must stay within home; an existing script must also be a plausible executable.
 */
export async function scriptPathValidate(script: string, homeDir: string): Promise<string> {
    safetyAssert(await validatePathWithinHome(script, homeDir), script);
    const expanded = pathExpandHome(script, homeDir);
    if (await pathExists(expanded)) {
        safetyAssert(await validateExecutableCandidate(expanded), script);
    }
    return expanded;
}

async function blockScriptsValidate(block: PreferenceBlock, homeDir: string): Promise<void> {
    for (const script of [block.pre_launch_script, block.post_launch_script]) {
        if (typeof script === "string") {
            await scriptPathValidate(script, homeDir);
        }
    }
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.lstat(target);
        return true;
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return false;
        }
        throw error;
    }
}

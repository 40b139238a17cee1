import { AliasResolutionError } from "../errors/aliasResolutionError.js";
import { getLogger } from "../log.js";
import type { ConfigStore } from "../preferences/configStore.js";
import { safetyAssert } from "../safety/safetyAssert.js";
import { validateIdentifierFormat } from "../safety/validateIdentifierFormat.js";
import { wrapperRegistryRead } from "../wrappers/wrapperRegistryRead.js";
import { aliasCreatePlan } from "./aliasCreatePlan.js";
import { aliasGraphBuild } from "./aliasGraphBuild.js";
import { aliasRecordsRead } from "./aliasRecordsRead.js";
import { aliasRecordsWrite } from "./aliasRecordsWrite.js";
import { type AliasResolution, aliasResolve } from "./aliasResolve.js";
import type { AliasRecord } from "./aliasTypes.js";

const logger = getLogger("alias.store");

export type AliasCreateOptions = {
    force?: boolean;
    /** Overrides the installed-wrapper lookup, which otherwise scans the wrapper directory. */
    wrapperExists?: (name: string) => boolean;
};

export type AliasCreateResult = {
    record: AliasRecord;
    previousTarget: string | null;
    unchanged: boolean;
};

/**
 * Alias records persisted in the configuration root's alias file.
 */
export class AliasStore {
    private readonly store: ConfigStore;

    constructor(store: ConfigStore) {
        this.store = store;
    }

    async list(): Promise<AliasRecord[]> {
        return aliasRecordsRead(this.store.config.aliasesPath);
    }

    /**
     * Adds or (with force) replaces an alias.
     * Throws AliasResolutionError for collisions, cycles and over-long chains.
     */
    async create(aliasName: string, targetName: string, options: AliasCreateOptions = {}): Promise<AliasCreateResult> {
        const blocklist = await this.store.blocklistRead();
        safetyAssert(validateIdentifierFormat(aliasName, blocklist), aliasName);
        safetyAssert(validateIdentifierFormat(targetName, blocklist), targetName);
        const wrapperExists = options.wrapperExists ?? (await this.wrapperLookupBuild());

        return this.store.lock.inLock(async () => {
            const records = await this.list();
            const plan = aliasCreatePlan(aliasGraphBuild(records), aliasName, targetName, {
                force: options.force,
                wrapperExists
            });
            if (!plan.ok) {
                throw new AliasResolutionError(plan.kind, plan.reason, { input: `${aliasName} -> ${targetName}` });
            }
            const record = { aliasName, targetName };
            if (plan.unchanged) {
                return { record, previousTarget: plan.previousTarget, unchanged: true };
            }
            if (plan.previousTarget !== null) {
                logger.warn({ alias: aliasName, previousTarget: plan.previousTarget, target: targetName }, "alias replaced");
            }
            const next = records.filter((existing) => existing.aliasName !== aliasName);
            next.push(record);
            await aliasRecordsWrite(this.store.config.aliasesPath, next);
            return { record, previousTarget: plan.previousTarget, unchanged: false };
        });
    }

    async remove(aliasName: string): Promise<boolean> {
        return this.store.lock.inLock(async () => {
            const records = await this.list();
            const next = records.filter((record) => record.aliasName !== aliasName);
            if (next.length === records.length) {
                return false;
            }
            await aliasRecordsWrite(this.store.config.aliasesPath, next);
            return true;
        });
    }

    async resolve(name: string): Promise<AliasResolution> {
        return aliasResolve(aliasGraphBuild(await this.list()), name);
    }

    private async wrapperLookupBuild(): Promise<(name: string) => boolean> {
        const registry = await wrapperRegistryRead(this.store.config.binDir);
        return (name) => registry.has(name);
    }
}

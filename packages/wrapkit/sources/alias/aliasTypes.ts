export type AliasRecord = {
    aliasName: string;
    targetName: string;
};

/** Adjacency map: alias name -> target name. */
export type AliasGraph = ReadonlyMap<string, string>;

export type AliasCreatePlan =
    | { ok: true; previousTarget: string | null; unchanged: boolean }
    | { ok: false; kind: "collision" | "cycle" | "hop_limit"; reason: string };

export const ALIAS_MAX_HOPS = 16;

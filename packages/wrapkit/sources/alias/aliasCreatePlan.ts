import { ALIAS_MAX_HOPS, type AliasCreatePlan, type AliasGraph } from "./aliasTypes.js";

export type AliasCreatePlanOptions = {
    force?: boolean;
    /** True when name is an installed wrapper. */
    wrapperExists?: (name: string) => boolean;
};

/**
 * Decides whether `aliasName -> targetName` may be added to graph.
 * Collisions yield to force; cycles and over-long chains never do.
 */
export function aliasCreatePlan(
    graph: AliasGraph,
    aliasName: string,
    targetName: string,
    options: AliasCreatePlanOptions = {}
): AliasCreatePlan {
    const previousTarget = graph.get(aliasName) ?? null;
    if (previousTarget === targetName) {
        return { ok: true, previousTarget, unchanged: true };
    }

    if (!options.force) {
        if (options.wrapperExists?.(aliasName)) {
            return { ok: false, kind: "collision", reason: `"${aliasName}" is already an installed wrapper.` };
        }
        if (previousTarget !== null) {
            return {
                ok: false,
                kind: "collision",
                reason: `"${aliasName}" already points to "${previousTarget}".`
            };
        }
    }

    // Reaching the alias from its own target means the new edge would close a loop.
    let current = targetName;
    let outboundDepth = 0;
    for (;;) {
        if (current === aliasName) {
            return { ok: false, kind: "cycle", reason: `"${aliasName}" -> "${targetName}" would create a cycle.` };
        }
        const next = graph.get(current);
        if (next === undefined) {
            break;
        }
        outboundDepth += 1;
        if (outboundDepth > ALIAS_MAX_HOPS) {
            return { ok: false, kind: "cycle", reason: `"${targetName}" does not resolve within ${ALIAS_MAX_HOPS} hops.` };
        }
        current = next;
    }

    const longest = aliasInboundDepth(graph, aliasName) + 1 + outboundDepth;
    if (longest > ALIAS_MAX_HOPS) {
        return {
            ok: false,
            kind: "hop_limit",
            reason: `"${aliasName}" -> "${targetName}" would make a chain of ${longest} hops.`
        };
    }
    return { ok: true, previousTarget, unchanged: false };
}

/**
 * Longest chain of existing aliases that ends at name.
 * Each alias has one target, so the inbound edges form a tree and BFS depth is exact.
 */
function aliasInboundDepth(graph: AliasGraph, name: string): number {
    const inbound = new Map<string, string[]>();
    for (const [alias, target] of graph) {
        const sources = inbound.get(target) ?? [];
        sources.push(alias);
        inbound.set(target, sources);
    }

    let depth = 0;
    let frontier = [name];
    const seen = new Set([name]);
    while (frontier.length > 0 && depth <= ALIAS_MAX_HOPS) {
        const next: string[] = [];
        for (const node of frontier) {
            for (const source of inbound.get(node) ?? []) {
                if (!seen.has(source)) {
                    seen.add(source);
                    next.push(source);
                }
            }
        }
        if (next.length === 0) {
            break;
        }
        depth += 1;
        frontier = next;
    }
    return depth;
}

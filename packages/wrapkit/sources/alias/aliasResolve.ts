import { AliasResolutionError } from "../errors/aliasResolutionError.js";
import { ALIAS_MAX_HOPS, type AliasGraph } from "./aliasTypes.js";

export type AliasResolution = {
    name: string;
    /** Terminal, non-alias name. */
    target: string;
    /** Every name visited, starting with name and ending with target. */
    chain: string[];
};

/**
 * Follows alias edges to a terminal name. Exceeding the hop limit is fatal.
 */
export function aliasResolve(graph: AliasGraph, name: string, maxHops = ALIAS_MAX_HOPS): AliasResolution {
    const chain = [name];
    let current = name;
    for (let hop = 0; hop < maxHops; hop++) {
        const next = graph.get(current);
        if (next === undefined) {
            return { name, target: current, chain };
        }
        chain.push(next);
        current = next;
    }
    if (!graph.has(current)) {
        return { name, target: current, chain };
    }
    throw new AliasResolutionError("hop_limit", `Alias "${name}" did not resolve within ${maxHops} hops.`, {
        input: name,
        chain
    });
}

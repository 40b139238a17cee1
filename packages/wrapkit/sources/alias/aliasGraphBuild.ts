import type { AliasGraph, AliasRecord } from "./aliasTypes.js";

/**
 * Builds the adjacency map; a later record for the same alias wins.
 */
export function aliasGraphBuild(records: AliasRecord[]): AliasGraph {
    const graph = new Map<string, string>();
    for (const record of records) {
        graph.set(record.aliasName, record.targetName);
    }
    return graph;
}

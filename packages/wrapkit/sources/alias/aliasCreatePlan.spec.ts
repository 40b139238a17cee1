import { describe, expect, it } from "vitest";

import { aliasCreatePlan } from "./aliasCreatePlan.js";
import { aliasResolve } from "./aliasResolve.js";
import { ALIAS_MAX_HOPS } from "./aliasTypes.js";

/** Small deterministic PRNG so failures replay. */
function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

describe("aliasCreatePlan", () => {
    it("accepts a fresh alias", () => {
        expect(aliasCreatePlan(new Map(), "ff", "firefox")).toEqual({
            ok: true,
            previousTarget: null,
            unchanged: false
        });
    });

    it("rejects b -> a after a -> b even with force", () => {
        const graph = new Map([["a", "b"]]);
        expect(aliasCreatePlan(graph, "b", "a", { force: true })).toEqual({
            ok: false,
            kind: "cycle",
            reason: '"b" -> "a" would create a cycle.'
        });
        expect(aliasCreatePlan(graph, "b", "a")).toMatchObject({ ok: false, kind: "cycle" });
    });

    it("treats a self alias as a cycle", () => {
        expect(aliasCreatePlan(new Map(), "x", "x", { force: true })).toMatchObject({ ok: false, kind: "cycle" });
    });

    it("detects longer cycles", () => {
        const graph = new Map([
            ["a", "b"],
            ["b", "c"]
        ]);
        expect(aliasCreatePlan(graph, "c", "a", { force: true })).toMatchObject({ ok: false, kind: "cycle" });
    });

    it("reports collisions unless forced", () => {
        const graph = new Map([["ff", "firefox"]]);
        const wrapperExists = (name: string) => name === "gimp";

        expect(aliasCreatePlan(graph, "ff", "floorp")).toEqual({
            ok: false,
            kind: "collision",
            reason: '"ff" already points to "firefox".'
        });
        expect(aliasCreatePlan(graph, "gimp", "krita", { wrapperExists })).toEqual({
            ok: false,
            kind: "collision",
            reason: '"gimp" is already an installed wrapper.'
        });
        expect(aliasCreatePlan(graph, "ff", "floorp", { force: true })).toEqual({
            ok: true,
            previousTarget: "firefox",
            unchanged: false
        });
        expect(aliasCreatePlan(graph, "ff", "firefox")).toEqual({
            ok: true,
            previousTarget: "firefox",
            unchanged: true
        });
    });

    it("rejects edges that would make a chain longer than the hop limit", () => {
        const graph = new Map<string, string>();
        for (let i = 0; i < ALIAS_MAX_HOPS; i++) {
            graph.set(`n${i}`, `n${i + 1}`);
        }
        expect(aliasResolve(graph, "n0").target).toBe(`n${ALIAS_MAX_HOPS}`);
        expect(aliasCreatePlan(graph, "head", "n0")).toEqual({
            ok: false,
            kind: "hop_limit",
            reason: `"head" -> "n0" would make a chain of ${ALIAS_MAX_HOPS + 1} hops.`
        });
        expect(aliasCreatePlan(graph, `n${ALIAS_MAX_HOPS}`, "tail")).toMatchObject({ ok: false, kind: "hop_limit" });
    });

    it("never lets a random edge sequence exceed the hop limit", () => {
        const names = Array.from({ length: 10 }, (_, index) => `app${index}`);
        for (let seed = 1; seed <= 40; seed++) {
            const random = mulberry32(seed);
            const pick = () => names[Math.floor(random() * names.length)] ?? "app0";
            const graph = new Map<string, string>();

            for (let step = 0; step < 60; step++) {
                const alias = pick();
                const target = pick();
                const plan = aliasCreatePlan(graph, alias, target, { force: random() < 0.5 });
                if (plan.ok) {
                    graph.set(alias, target);
                }
                for (const name of graph.keys()) {
                    const resolution = aliasResolve(graph, name);
                    expect(resolution.chain.length - 1).toBeLessThanOrEqual(ALIAS_MAX_HOPS);
                    expect(new Set(resolution.chain).size).toBe(resolution.chain.length);
                    expect(graph.has(resolution.target)).toBe(false);
                }
            }
        }
    });
});

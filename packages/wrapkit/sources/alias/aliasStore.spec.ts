import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { configResolve } from "../config/configResolve.js";
import { AliasResolutionError } from "../errors/aliasResolutionError.js";
import { ValidationError } from "../errors/validationError.js";
import { ConfigStore } from "../preferences/configStore.js";
import { wrapperScriptBuild } from "../wrappers/wrapperScriptBuild.js";
import { AliasStore } from "./aliasStore.js";

describe("AliasStore", () => {
    let home: string;
    let store: ConfigStore;
    let aliases: AliasStore;

    beforeEach(async () => {
        home = await fs.mkdtemp(path.join(os.tmpdir(), "wrapkit-alias-"));
        store = new ConfigStore(configResolve({ HOME: home, PATH: "" }));
        await store.init();
        aliases = new AliasStore(store);
    });

    afterEach(async () => {
        await fs.rm(home, { recursive: true, force: true });
    });

    it("persists aliases one pair per line", async () => {
        await aliases.create("ff", "firefox");
        await aliases.create("web", "ff");

        expect(await fs.readFile(store.config.aliasesPath, "utf8")).toBe("ff firefox\nweb ff\n");
        expect(await aliases.list()).toEqual([
            { aliasName: "ff", targetName: "firefox" },
            { aliasName: "web", targetName: "ff" }
        ]);
        expect(await aliases.resolve("web")).toEqual({ name: "web", target: "firefox", chain: ["web", "ff", "firefox"] });
    });

    it("rejects a -> b then b -> a even with force", async () => {
        await aliases.create("a", "b");
        const attempt = aliases.create("b", "a", { force: true });
        await expect(attempt).rejects.toBeInstanceOf(AliasResolutionError);
        await expect(aliases.create("b", "a", { force: true })).rejects.toMatchObject({ kind: "cycle" });
        expect(await aliases.list()).toEqual([{ aliasName: "a", targetName: "b" }]);
    });

    it("treats installed wrappers as collisions unless forced", async () => {
        await fs.mkdir(store.config.binDir, { recursive: true });
        await fs.writeFile(path.join(store.config.binDir, "gimp"), wrapperScriptBuild("gimp", "org.gimp.GIMP"), {
            mode: 0o755
        });

        await expect(aliases.create("gimp", "krita")).rejects.toMatchObject({ kind: "collision" });
        const forced = await aliases.create("gimp", "krita", { force: true });
        expect(forced).toEqual({
            record: { aliasName: "gimp", targetName: "krita" },
            previousTarget: null,
            unchanged: false
        });
    });

    it("replaces an alias under force and reports the previous target", async () => {
        await aliases.create("ff", "firefox");
        await expect(aliases.create("ff", "floorp")).rejects.toMatchObject({ kind: "collision" });

        const replaced = await aliases.create("ff", "floorp", { force: true, wrapperExists: () => false });
        expect(replaced.previousTarget).toBe("firefox");
        expect(await aliases.list()).toEqual([{ aliasName: "ff", targetName: "floorp" }]);
    });

    it("validates both names", async () => {
        await expect(aliases.create("sudo", "firefox")).rejects.toBeInstanceOf(ValidationError);
        await expect(aliases.create("ff", "fire;fox")).rejects.toBeInstanceOf(ValidationError);
        await store.blocklistAdd("steam");
        await expect(aliases.create("games", "steam")).rejects.toMatchObject({ code: "FORBIDDEN" });
    });

    it("removes aliases", async () => {
        await aliases.create("ff", "firefox");
        expect(await aliases.remove("ff")).toBe(true);
        expect(await aliases.remove("ff")).toBe(false);
        expect(await aliases.list()).toEqual([]);
    });

    it("skips malformed lines in the alias file", async () => {
        await fs.writeFile(store.config.aliasesPath, "ff firefox\nbroken\na b c\nx;y z\n");
        expect(await aliases.list()).toEqual([{ aliasName: "ff", targetName: "firefox" }]);
    });
});

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AliasStore } from "../alias/aliasStore.js";
import { configResolve } from "../config/configResolve.js";
import { WrapkitError } from "../errors/wrapkitError.js";
import { HookExecutor } from "../hooks/hookExecutor.js";
import { ConfigStore } from "../preferences/configStore.js";
import type { LaunchChoice } from "../preferences/preferenceTypes.js";
import { wrapperScriptBuild } from "../wrappers/wrapperScriptBuild.js";
import { LaunchEngine } from "./launchEngine.js";
import type { LaunchDecision, LaunchRequest, PreferencePromptRequest } from "./launchTypes.js";

describe("LaunchEngine", () => {
    let root: string;
    let home: string;
    let binDir: string;
    let systemA: string;
    let systemB: string;
    let warnings: string[];

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), "wrapkit-launch-"));
        home = path.join(root, "home");
        binDir = path.join(home, "bin");
        systemA = path.join(root, "usr-local-bin");
        systemB = path.join(root, "usr-bin");
        warnings = [];
        for (const dir of [binDir, systemA, systemB]) {
            await fs.mkdir(dir, { recursive: true });
        }
        await fs.writeFile(path.join(binDir, "editor"), wrapperScriptBuild("editor", "org.example.Editor"), {
            mode: 0o755
        });
        await executableWrite(path.join(systemA, "editor"));
        await executableWrite(path.join(systemB, "editor"));
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    async function executableWrite(filePath: string, body = "exit 0"): Promise<string> {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
        return filePath;
    }

    async function engineCreate(searchPath: string[], answer: LaunchChoice | null = "system") {
        const store = new ConfigStore(configResolve({ HOME: home, PATH: searchPath.join(path.delimiter) }));
        await store.init();
        const aliases = new AliasStore(store);
        const executor = vi.fn(async (_decision: LaunchDecision) => 0);
        const prompt = vi.fn(async (_request: PreferencePromptRequest) => answer);
        const hooks = new HookExecutor({
            timeoutMs: 5_000,
            env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
            stdio: "ignore",
            warn: (message) => warnings.push(message)
        });
        const engine = new LaunchEngine({ store, aliases, hooks, prompt, executor });
        return { engine, store, aliases, executor, prompt };
    }

    function request(overrides: Partial<LaunchRequest> = {}): LaunchRequest {
        return {
            wrapperName: "editor",
            args: ["notes.txt"],
            stdinIsTTY: true,
            stdoutIsTTY: true,
            env: { LANG: "C" },
            ...overrides
        };
    }

    it("bypasses the recorded preference and runs the first non-self match on the search path", async () => {
        const { engine, store, executor, prompt } = await engineCreate([binDir, systemA, systemB]);
        await store.preferenceWrite("editor", "system");
        await store.save({ layer: "app", app: "editor" }, "custom_args", ["--from-config"]);

        const result = await engine.launch(request({ stdinIsTTY: false }));

        expect(result.decision).toEqual({
            targetKind: "system",
            target: path.join(systemA, "editor"),
            args: ["notes.txt"],
            env: { LANG: "C" }
        });
        expect(result.states).toEqual(["START", "INTERACTIVITY_CHECK", "BYPASS", "EXECUTE", "DONE"]);
        expect(result).toMatchObject({ ok: true, exitCode: 0, preHook: null, postHook: null });
        expect(executor).toHaveBeenCalledTimes(1);
        expect(prompt).not.toHaveBeenCalled();
    });

    it("bypasses a recorded package preference too", async () => {
        const { engine, store } = await engineCreate([binDir, systemA]);
        await store.preferenceWrite("editor", "package");

        const result = await engine.launch(request({ env: { WRAPKIT_FORCE: "desktop" } }));

        expect(result.decision?.targetKind).toBe("system");
        expect(result.decision?.target).toBe(path.join(systemA, "editor"));
    });

    it("falls back to the package when no system binary exists in bypass", async () => {
        const { engine } = await engineCreate([binDir]);

        const result = await engine.launch(request({ forceDesktop: true }));

        expect(result.decision).toEqual({
            targetKind: "package",
            target: "org.example.Editor",
            args: ["notes.txt"],
            env: { LANG: "C" }
        });
    });

    it("never starts the application when a pre-launch hook aborts", async () => {
        const { engine, store, executor } = await engineCreate([binDir, systemA]);
        const script = await executableWrite(path.join(home, "hooks", "check.sh"), "exit 9");
        await store.save({ layer: "app", app: "editor" }, "pre_launch_script", script);
        await store.save({ layer: "app", app: "editor" }, "pre_launch_failure_mode", "abort");
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request());

        expect(result.ok).toBe(false);
        expect(result.exitCode).toBe(9);
        expect(result.states).toEqual(["START", "INTERACTIVITY_CHECK", "RESOLVE_TARGET", "PRE_HOOK", "DONE"]);
        expect(result.preHook).toMatchObject({ executed: true, exitCode: 9, aborted: true });
        expect(executor).not.toHaveBeenCalled();
        expect(warnings).toEqual(["pre-launch hook exited with code 9; launch aborted"]);
    });

    it("lets a runtime override relax an aborting pre-launch hook", async () => {
        const { engine, store, executor } = await engineCreate([binDir, systemA]);
        const script = await executableWrite(path.join(home, "hooks", "check.sh"), "exit 9");
        await store.save({ layer: "app", app: "editor" }, "pre_launch_script", script);
        await store.save({ layer: "app", app: "editor" }, "pre_launch_failure_mode", "abort");
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request({ failureModeOverride: "ignore" }));

        expect(result).toMatchObject({ ok: true, exitCode: 0 });
        expect(executor).toHaveBeenCalledTimes(1);
        expect(warnings).toEqual([]);
    });

    it("starts the application when a pre-launch hook cannot be started under warn", async () => {
        const { engine, store, executor } = await engineCreate([binDir, systemA]);
        const script = path.join(home, "hooks", "broken.sh");
        await fs.mkdir(path.dirname(script), { recursive: true });
        await fs.writeFile(script, "#!/nonexistent/interp\nexit 0\n", { mode: 0o755 });
        await store.save({ layer: "app", app: "editor" }, "pre_launch_script", script);
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request());

        expect(result).toMatchObject({ ok: true, exitCode: 0 });
        expect(result.preHook).toMatchObject({ executed: true, exitCode: 127, failureMode: "warn", aborted: false });
        expect(executor).toHaveBeenCalledTimes(1);
        expect(warnings).toEqual(["pre-launch hook could not be started: ENOENT"]);
    });

    it("aborts when a pre-launch hook cannot be started under abort", async () => {
        const { engine, store, executor } = await engineCreate([binDir, systemA]);
        const script = path.join(home, "hooks", "broken.sh");
        await fs.mkdir(path.dirname(script), { recursive: true });
        await fs.writeFile(script, "#!/nonexistent/interp\nexit 0\n", { mode: 0o755 });
        await store.save({ layer: "app", app: "editor" }, "pre_launch_script", script);
        await store.save({ layer: "app", app: "editor" }, "pre_launch_failure_mode", "abort");
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request());

        expect(result).toMatchObject({ ok: false, exitCode: 127 });
        expect(executor).not.toHaveBeenCalled();
        expect(warnings).toEqual(["pre-launch hook could not be started: ENOENT; launch aborted"]);
    });

    it("reports a failing post-launch hook's exit code under abort", async () => {
        const { engine, store } = await engineCreate([binDir, systemA]);
        const script = await executableWrite(path.join(home, "hooks", "after.sh"), "exit 4");
        await store.save({ layer: "app", app: "editor" }, "post_launch_script", script);
        await store.save({ layer: "global" }, "post_launch_failure_mode", "abort");
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request());

        expect(result.ok).toBe(false);
        expect(result.exitCode).toBe(4);
        expect(result.states).toEqual([
            "START",
            "INTERACTIVITY_CHECK",
            "RESOLVE_TARGET",
            "PRE_HOOK",
            "EXECUTE",
            "POST_HOOK",
            "DONE"
        ]);
        expect(warnings).toEqual(["post-launch hook exited with code 4"]);
    });

    it("asks once when both targets exist and records the answer", async () => {
        const { engine, store, prompt } = await engineCreate([binDir, systemA], "package");

        const first = await engine.launch(request());
        const second = await engine.launch(request());

        expect(prompt).toHaveBeenCalledTimes(1);
        expect(prompt).toHaveBeenCalledWith({
            appName: "editor",
            systemPath: path.join(systemA, "editor"),
            packageId: "org.example.Editor"
        });
        expect(first.decision?.targetKind).toBe("package");
        expect(second.decision?.targetKind).toBe("package");
        expect(await store.preferenceRead("editor")).toBe("package");
    });

    it("records system when the question goes unanswered", async () => {
        const { engine, store } = await engineCreate([binDir, systemA], null);

        const result = await engine.launch(request());

        expect(result.decision?.target).toBe(path.join(systemA, "editor"));
        expect(await store.preferenceRead("editor")).toBe("system");
    });

    it("applies configured arguments and environment overrides in interactive launches", async () => {
        const { engine, store } = await engineCreate([binDir, systemA]);
        await store.save({ layer: "app", app: "editor" }, "launch_method", "package");
        await store.save({ layer: "app", app: "editor" }, "custom_args", ["--new-window"]);
        await store.save({ layer: "app", app: "editor" }, "env_vars", { LANG: "en_US.UTF-8", EDITOR_THEME: "dark" });

        const result = await engine.launch(request());

        expect(result.decision).toEqual({
            targetKind: "package",
            target: "org.example.Editor",
            args: ["--new-window", "notes.txt"],
            env: { LANG: "en_US.UTF-8", EDITOR_THEME: "dark" }
        });
    });

    it("switches a stale system preference to the package", async () => {
        const { engine, store } = await engineCreate([binDir]);
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request());

        expect(result.decision?.targetKind).toBe("package");
        expect(await store.preferenceRead("editor")).toBe("package");
    });

    it("honors a one-shot choice without recording it", async () => {
        const { engine, store, prompt } = await engineCreate([binDir, systemA]);
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request({ launchChoice: "package" }));

        expect(result.decision?.targetKind).toBe("package");
        expect(await store.preferenceRead("editor")).toBe("system");
        expect(prompt).not.toHaveBeenCalled();
    });

    it("launches through an alias", async () => {
        const { engine, aliases, store } = await engineCreate([binDir, systemA]);
        await aliases.create("ed", "editor");
        await store.preferenceWrite("editor", "system");

        const result = await engine.launch(request({ wrapperName: "ed" }));

        expect(result.decision?.target).toBe(path.join(systemA, "editor"));
    });

    it("fails when neither a system binary nor a package exists", async () => {
        const { engine, executor } = await engineCreate([binDir]);

        await expect(engine.launch(request({ wrapperName: "nothing-here", stdinIsTTY: false }))).rejects.toBeInstanceOf(
            WrapkitError
        );
        expect(executor).not.toHaveBeenCalled();
    });
});

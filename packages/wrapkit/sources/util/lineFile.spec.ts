import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { lineFileRead } from "./lineFileRead.js";
import { lineFileWrite } from "./lineFileWrite.js";

describe("lineFileRead", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "wrapkit-lines-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("returns an empty list for a missing file", async () => {
        expect(await lineFileRead(path.join(dir, "missing"))).toEqual([]);
    });

    it("skips blank lines and comments", async () => {
        const target = path.join(dir, "blocklist");
        await fs.writeFile(target, "# blocked\nsteam\n\n  vlc  \r\n", "utf8");
        expect(await lineFileRead(target)).toEqual(["steam", "vlc"]);
    });

    it("reads back what lineFileWrite wrote", async () => {
        const target = path.join(dir, "aliases");
        await lineFileWrite(target, ["ff firefox", "code vscode"]);
        expect(await fs.readFile(target, "utf8")).toBe("ff firefox\ncode vscode\n");
        expect(await lineFileRead(target)).toEqual(["ff firefox", "code vscode"]);
    });
});

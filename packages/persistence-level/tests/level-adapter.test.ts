import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { collectByPrefix } from "@miniapp/persistence-adapter";
import { LevelKeyValueAdapter } from "../src/level-adapter.ts";

describe("LevelKeyValueAdapter", () => {
    let directory: string;
    let adapter: LevelKeyValueAdapter<unknown>;

    beforeEach(async () => {
        directory = await mkdtemp(path.join(tmpdir(), "miniapp-level-"));
        adapter = new LevelKeyValueAdapter(path.join(directory, "db"));
        await adapter.open();
    });

    afterEach(async () => {
        await adapter.close();
        await rm(directory, { recursive: true, force: true });
    });

    it("resolves undefined for a missing key", async () => {
        assert.equal(await adapter.get("page:missing"), undefined);
    });

    it("stores JSON values", async () => {
        const page = { id: "p1", name: "Home", isHome: true, config: { items: [1, null, "x"] } };
        await adapter.put("page:p1", page);

        assert.deepEqual(await adapter.get("page:p1"), page);

        await adapter.del("page:p1");
        assert.equal(await adapter.get("page:p1"), undefined);
    });

    it("iterates a prefix in key order", async () => {
        await adapter.batch([
            { type: "put", key: "widget:p1:b", value: { position: 2 } },
            { type: "put", key: "widget:p2:a", value: { position: 1 } },
            { type: "put", key: "widget:p1:a", value: { position: 1 } },
        ]);

        const entries = await collectByPrefix(adapter, "widget:p1:");
        assert.deepEqual(entries, [
            ["widget:p1:a", { position: 1 }],
            ["widget:p1:b", { position: 2 }],
        ]);
    });

    it("applies deletes and puts of one batch together", async () => {
        await adapter.put("route-index:/old", "p1");
        await adapter.batch([
            { type: "del", key: "route-index:/old" },
            { type: "put", key: "route-index:/new", value: "p1" },
        ]);

        assert.equal(await adapter.get("route-index:/old"), undefined);
        assert.equal(await adapter.get("route-index:/new"), "p1");
    });

    it("keeps data across reopen", async () => {
        await adapter.put("home-page", "p1");
        await adapter.close();

        const reopened = new LevelKeyValueAdapter<unknown>(path.join(directory, "db"));
        assert.equal(await reopened.get("home-page"), "p1");
        await reopened.close();
    });
});

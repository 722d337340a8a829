import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import { z } from "zod";
import { PageSchema, WidgetSchema, type Page, type Widget } from "@miniapp/pages";
import {
    ErrorBodySchema,
    MessageSchema,
    readJson,
    sendJson,
    startTestApi,
    type TestApi,
} from "./http-fixtures.ts";

const WidgetListSchema = z.object({ widgets: z.array(WidgetSchema), total: z.number() });
const ReorderResponseSchema = z.object({ message: z.string(), widgets: z.array(WidgetSchema) });

const UNKNOWN_ID = "0f6b2d3c-8a1e-4c5b-9d7f-2e3a4b5c6d7e";

describe("widget routes", () => {
    let api: TestApi;
    let page: Page;

    beforeEach(async () => {
        api = await startTestApi();
        const response = await sendJson(`${api.base}/api/v1/pages`, "POST", { name: "Home", route: "/home" });
        page = await readJson(response, PageSchema);
    });

    afterEach(async () => {
        await api.close();
    });

    const widgetsUrl = (pageId: string): string => `${api.base}/api/v1/pages/${pageId}/widgets`;

    const addWidget = async (body: unknown): Promise<Widget> => {
        const response = await sendJson(widgetsUrl(page.id), "POST", body);
        assert.equal(response.status, 201);
        return readJson(response, WidgetSchema);
    };

    it("creates widgets at the next position", async () => {
        const first = await addWidget({ type: "banner", config: { title: "Hello" } });
        const second = await addWidget({ type: "text" });

        assert.equal(first.position, 1);
        assert.deepEqual(first.config, { title: "Hello" });
        assert.equal(second.position, 2);
        assert.deepEqual(second.config, {});
    });

    it("rejects an unknown widget type", async () => {
        const response = await sendJson(widgetsUrl(page.id), "POST", { type: "video" });

        assert.equal(response.status, 400);
        assert.deepEqual(await readJson(response, ErrorBodySchema), {
            error: {
                code: "VALIDATION_ERROR",
                message: "Invalid widget type. Must be one of: banner, product_grid, text, image, spacer",
            },
        });
    });

    it("rejects a fractional position", async () => {
        const response = await sendJson(widgetsUrl(page.id), "POST", { type: "text", position: 1.5 });

        assert.equal(response.status, 400);
        assert.deepEqual(await readJson(response, ErrorBodySchema), {
            error: { code: "VALIDATION_ERROR", message: "Invalid request body: position: Expected integer, received float" },
        });
    });

    it("answers 404 for widgets of an unknown page", async () => {
        const created = await sendJson(widgetsUrl(UNKNOWN_ID), "POST", { type: "text" });
        assert.equal(created.status, 404);

        const listed = await fetch(widgetsUrl(UNKNOWN_ID));
        assert.equal(listed.status, 404);
        assert.deepEqual(await readJson(listed, ErrorBodySchema), {
            error: { code: "NOT_FOUND", message: "Page not found" },
        });
    });

    it("lists widgets filtered by type", async () => {
        await addWidget({ type: "banner" });
        const text = await addWidget({ type: "text" });

        const response = await fetch(`${widgetsUrl(page.id)}?type=text`);

        assert.equal(response.status, 200);
        const list = await readJson(response, WidgetListSchema);
        assert.equal(list.total, 1);
        assert.deepEqual(list.widgets.map((widget) => widget.id), [text.id]);
    });

    it("reorders the widgets of a page", async () => {
        const a = await addWidget({ type: "banner" });
        const b = await addWidget({ type: "text" });

        const response = await sendJson(`${widgetsUrl(page.id)}/reorder`, "POST", { widgetIds: [b.id, a.id] });

        assert.equal(response.status, 200);
        const body = await readJson(response, ReorderResponseSchema);
        assert.equal(body.message, "Widgets reordered successfully");
        assert.deepEqual(
            body.widgets.map((widget) => [widget.id, widget.position]),
            [
                [b.id, 1],
                [a.id, 2],
            ],
        );
    });

    it("answers a reorder naming a foreign widget with 409", async () => {
        const a = await addWidget({ type: "banner" });
        const other = await readJson(
            await sendJson(`${api.base}/api/v1/pages`, "POST", { name: "Sale", route: "/sale" }),
            PageSchema,
        );
        const foreign = await readJson(await sendJson(widgetsUrl(other.id), "POST", { type: "text" }), WidgetSchema);

        const response = await sendJson(`${widgetsUrl(page.id)}/reorder`, "POST", { widgetIds: [foreign.id] });

        assert.equal(response.status, 409);
        assert.deepEqual(await readJson(response, ErrorBodySchema), {
            error: { code: "CONFLICT", message: `widget ${foreign.id} not found on page ${page.id}` },
        });
        const remaining = await readJson(await fetch(widgetsUrl(page.id)), WidgetListSchema);
        assert.deepEqual(remaining.widgets.map((widget) => [widget.id, widget.position]), [[a.id, 1]]);
    });

    it("rejects reorder ids that are not uuids", async () => {
        const response = await sendJson(`${widgetsUrl(page.id)}/reorder`, "POST", { widgetIds: ["nope"] });

        assert.equal(response.status, 400);
        assert.deepEqual(await readJson(response, ErrorBodySchema), {
            error: { code: "VALIDATION_ERROR", message: "Invalid request body: widgetIds.0: Invalid uuid" },
        });
    });

    it("updates a widget", async () => {
        const widget = await addWidget({ type: "text" });

        const response = await sendJson(`${api.base}/api/v1/widgets/${widget.id}`, "PUT", {
            position: 4,
            config: { body: "Welcome" },
        });

        assert.equal(response.status, 200);
        const updated = await readJson(response, WidgetSchema);
        assert.equal(updated.position, 4);
        assert.deepEqual(updated.config, { body: "Welcome" });
        assert.equal(updated.type, "text");
    });

    it("distinguishes malformed and unknown widget ids", async () => {
        const malformed = await sendJson(`${api.base}/api/v1/widgets/123`, "PUT", { type: "text" });
        assert.equal(malformed.status, 400);
        assert.deepEqual(await readJson(malformed, ErrorBodySchema), {
            error: { code: "BAD_REQUEST", message: "Invalid widget ID format" },
        });

        const unknown = await fetch(`${api.base}/api/v1/widgets/${UNKNOWN_ID}`, { method: "DELETE" });
        assert.equal(unknown.status, 404);
        assert.deepEqual(await readJson(unknown, ErrorBodySchema), {
            error: { code: "NOT_FOUND", message: "Widget not found" },
        });
    });

    it("deletes a widget", async () => {
        const widget = await addWidget({ type: "spacer" });

        const response = await fetch(`${api.base}/api/v1/widgets/${widget.id}`, { method: "DELETE" });

        assert.equal(response.status, 200);
        assert.deepEqual(await readJson(response, MessageSchema), { message: "Widget deleted successfully" });
        const list = await readJson(await fetch(widgetsUrl(page.id)), WidgetListSchema);
        assert.equal(list.total, 0);
    });
});

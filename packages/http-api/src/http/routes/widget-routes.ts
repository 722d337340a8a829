import type express from "express";
import {
    CreateWidgetBodySchema,
    ReorderWidgetsBodySchema,
    UpdateWidgetBodySchema,
    type WidgetSequencerApi,
} from "@miniapp/pages";
import { parseBody, readQueryString, requireUuidParam, unwrap } from "../route-helpers.ts";

const INVALID_PAGE_ID = "Invalid page ID format";
const INVALID_WIDGET_ID = "Invalid widget ID format";

export function registerWidgetRoutes(router: express.Router, widgetSequencer: WidgetSequencerApi) {
    // GET /pages/:id/widgets?type= - Widgets of a page, optionally of one type
    router.get("/pages/:id/widgets", async (req, res, next) => {
        try {
            const pageId = requireUuidParam(req, "id", INVALID_PAGE_ID);
            const widgets = unwrap(
                await widgetSequencer.getWidgetsByPage(pageId, readQueryString(req, "type")),
            );
            res.json({ widgets, total: widgets.length });
        } catch (error) {
            next(error);
        }
    });

    router.post("/pages/:id/widgets", async (req, res, next) => {
        try {
            const pageId = requireUuidParam(req, "id", INVALID_PAGE_ID);
            const body = parseBody(CreateWidgetBodySchema, req.body);
            const widget = unwrap(await widgetSequencer.createWidget({ ...body, pageId }));
            res.status(201).json(widget);
        } catch (error) {
            next(error);
        }
    });

    // POST /pages/:id/widgets/reorder - Apply a full ordering of the page's widgets
    router.post("/pages/:id/widgets/reorder", async (req, res, next) => {
        try {
            const pageId = requireUuidParam(req, "id", INVALID_PAGE_ID);
            const { widgetIds } = parseBody(ReorderWidgetsBodySchema, req.body);
            const widgets = unwrap(await widgetSequencer.reorderWidgets(pageId, widgetIds));
            res.json({ message: "Widgets reordered successfully", widgets });
        } catch (error) {
            next(error);
        }
    });

    router.put("/widgets/:id", async (req, res, next) => {
        try {
            const id = requireUuidParam(req, "id", INVALID_WIDGET_ID);
            const input = parseBody(UpdateWidgetBodySchema, req.body);
            const widget = unwrap(await widgetSequencer.updateWidget(id, input));
            res.json(widget);
        } catch (error) {
            next(error);
        }
    });

    router.delete("/widgets/:id", async (req, res, next) => {
        try {
            const id = requireUuidParam(req, "id", INVALID_WIDGET_ID);
            unwrap(await widgetSequencer.deleteWidget(id));
            res.json({ message: "Widget deleted successfully" });
        } catch (error) {
            next(error);
        }
    });
}

import type express from "express";
import { NotFoundError } from "@miniapp/core";
import {
    CreatePageInputSchema,
    UpdatePageInputSchema,
    type PageDirectoryApi,
} from "@miniapp/pages";
import { parseBody, readQueryInteger, requireUuidParam, unwrap } from "../route-helpers.ts";

const INVALID_PAGE_ID = "Invalid page ID format";

export function registerPageRoutes(router: express.Router, pageDirectory: PageDirectoryApi) {
    // GET /pages - List pages, newest first
    router.get("/pages", async (req, res, next) => {
        try {
            const list = unwrap(
                await pageDirectory.listPages({
                    page: readQueryInteger(req, "page"),
                    perPage: readQueryInteger(req, "per_page"),
                }),
            );
            res.json(list);
        } catch (error) {
            next(error);
        }
    });

    // GET /pages/:id - Page with its widgets in position order
    router.get("/pages/:id", async (req, res, next) => {
        try {
            const id = requireUuidParam(req, "id", INVALID_PAGE_ID);
            const page = unwrap(await pageDirectory.getPageWithWidgets(id));
            if (!page) {
                throw new NotFoundError("Page", id);
            }
            res.json(page);
        } catch (error) {
            next(error);
        }
    });

    router.post("/pages", async (req, res, next) => {
        try {
            const input = parseBody(CreatePageInputSchema, req.body);
            const page = unwrap(await pageDirectory.createPage(input));
            res.status(201).json(page);
        } catch (error) {
            next(error);
        }
    });

    router.put("/pages/:id", async (req, res, next) => {
        try {
            const id = requireUuidParam(req, "id", INVALID_PAGE_ID);
            const input = parseBody(UpdatePageInputSchema, req.body);
            const page = unwrap(await pageDirectory.updatePage(id, input));
            res.json(page);
        } catch (error) {
            next(error);
        }
    });

    router.delete("/pages/:id", async (req, res, next) => {
        try {
            const id = requireUuidParam(req, "id", INVALID_PAGE_ID);
            unwrap(await pageDirectory.deletePage(id));
            res.json({ message: "Page deleted successfully" });
        } catch (error) {
            next(error);
        }
    });
}

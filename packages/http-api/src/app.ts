import cors, { type CorsOptions } from "cors";
import express from "express";
import { logger as defaultLogger, type AppConfig, type Logger } from "@miniapp/core";
import type { PageDirectoryApi, WidgetSequencerApi } from "@miniapp/pages";
import { createErrorHandler, createRequestLogger, notFoundHandler } from "./http/middleware.ts";
import { registerHealthRoutes } from "./http/routes/health-routes.ts";
import { registerPageRoutes } from "./http/routes/page-routes.ts";
import { registerWidgetRoutes } from "./http/routes/widget-routes.ts";

export const API_PREFIX = "/api/v1";

export type HttpApiDependencies = {
    pageDirectory: PageDirectoryApi;
    widgetSequencer: WidgetSequencerApi;
    logger?: Logger;
    cors?: AppConfig["cors"];
    bodyLimit?: string;
};

const buildCorsOptions = (config: AppConfig["cors"]): CorsOptions => ({
    origin: config.origins.includes("*") ? "*" : config.origins,
    credentials: config.credentials,
    methods: ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"],
});

// Factory to build the Express app over the page and widget services
export function buildHttpApiApp(deps: HttpApiDependencies): express.Application {
    const logger = deps.logger ?? defaultLogger;
    const app = express();

    app.use(createRequestLogger(logger));
    if (deps.cors?.enabled !== false) {
        app.use(cors(deps.cors ? buildCorsOptions(deps.cors) : undefined));
    }
    app.use(express.json({ limit: deps.bodyLimit ?? "1mb" }));

    registerHealthRoutes(app);

    const api = express.Router();
    registerPageRoutes(api, deps.pageDirectory);
    registerWidgetRoutes(api, deps.widgetSequencer);
    app.use(API_PREFIX, api);

    app.use(notFoundHandler);
    app.use(createErrorHandler(logger));

    return app;
}

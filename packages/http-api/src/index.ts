export * from "./app.ts";
export * from "./http/middleware.ts";
export * from "./http/route-helpers.ts";
export * from "./http/routes/health-routes.ts";
export * from "./http/routes/page-routes.ts";
export * from "./http/routes/widget-routes.ts";

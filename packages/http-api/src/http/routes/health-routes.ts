import type express from "express";

export const SERVICE_NAME = "Mini App Config API";

export function registerHealthRoutes(app: express.Application) {
    app.get("/health", (_req, res) => {
        res.json({
            status: "healthy",
            timestamp: new Date().toISOString(),
            service: SERVICE_NAME,
        });
    });
}

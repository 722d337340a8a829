import type { Server } from "node:http";
import { z } from "zod";
import { Logger } from "@miniapp/core";
import { InMemoryKeyValueAdapter } from "@miniapp/persistence-adapter";
import { createPagesModule, type PagesModule } from "@miniapp/pages";
import { buildHttpApiApp } from "../src/index.ts";

export const ErrorBodySchema = z.object({
    error: z.object({
        code: z.string(),
        message: z.string(),
    }),
});

export const MessageSchema = z.object({ message: z.string() });

export type TestApi = {
    base: string;
    pages: PagesModule;
    server: Server;
    close(): Promise<void>;
};

export const startTestApi = async (): Promise<TestApi> => {
    const pages = createPagesModule(new InMemoryKeyValueAdapter(), {
        logger: new Logger("error", "miniapp-test"),
    });
    await pages.open();
    const app = buildHttpApiApp({
        pageDirectory: pages.pageDirectory,
        widgetSequencer: pages.widgetSequencer,
        logger: new Logger("error", "miniapp-test"),
    });

    const server = await new Promise<Server>((resolve, reject) => {
        const listening = app.listen(0, "127.0.0.1");
        listening.once("listening", () => resolve(listening));
        listening.once("error", (error) => reject(error));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
        throw new Error("Server is not listening on a TCP port");
    }

    return {
        base: `http://127.0.0.1:${address.port}`,
        pages,
        server,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => (error ? reject(error) : resolve()));
            }).then(() => pages.close()),
    };
};

export const sendJson = (url: string, method: string, body: unknown): Promise<Response> =>
    fetch(url, {
        method,
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
    });

export const readJson = async <T>(response: Response, schema: z.ZodType<T>): Promise<T> =>
    schema.parse(await response.json());

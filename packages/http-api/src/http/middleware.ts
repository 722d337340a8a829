import type { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import {
    InternalError,
    isDomainError,
    type ErrorCode,
    type Logger,
} from "@miniapp/core";

export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
    VALIDATION_ERROR: 400,
    BAD_REQUEST: 400,
    NOT_FOUND: 404,
    CONFLICT: 409,
    INTERNAL_SERVER_ERROR: 500,
};

const errorBody = (code: ErrorCode, message: string): ErrorBody => ({ error: { code, message } });

// body-parser tags malformed JSON with this type.
const isMalformedBody = (error: unknown): error is Error =>
    error instanceof Error && "type" in error && error.type === "entity.parse.failed";

export function createRequestLogger(logger: Logger) {
    const httpLogger = logger.child({ component: "http" });
    return (req: Request, res: Response, next: NextFunction): void => {
        const start = Date.now();
        const requestId = uuidv4();
        res.setHeader("X-Request-Id", requestId);

        res.on("finish", () => {
            const duration = Date.now() - start;
            httpLogger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
                requestId,
                duration,
            });
        });

        next();
    };
}

export function notFoundHandler(_req: Request, res: Response): void {
    res.status(404).json(errorBody("NOT_FOUND", "Endpoint not found"));
}

export function createErrorHandler(logger: Logger) {
    const httpLogger = logger.child({ component: "http" });
    return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
        if (isMalformedBody(err)) {
            res.status(400).json(errorBody("VALIDATION_ERROR", `Invalid request body: ${err.message}`));
            return;
        }

        if (isDomainError(err) && !(err instanceof InternalError)) {
            res.status(STATUS_BY_CODE[err.code]).json(errorBody(err.code, err.message));
            return;
        }

        const message = err instanceof InternalError ? err.message : "Internal server error";
        const cause = err instanceof InternalError ? err.cause ?? err : err;
        httpLogger.error(`${req.method} ${req.originalUrl} failed`, cause);
        res.status(500).json(errorBody("INTERNAL_SERVER_ERROR", message));
    };
}

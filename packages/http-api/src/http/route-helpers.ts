import type { Request } from "express";
import { validate as isUuid } from "uuid";
import type { ZodType } from "zod";
import { BadRequestError, ValidationError, type Result } from "@miniapp/core";

/**
 * Returns the data of a successful result and throws the domain error of a
 * failed one, for the error middleware to render.
 */
export const unwrap = <T>(result: Result<T>): T => {
    if (!result.success) {
        throw result.error;
    }
    return result.data;
};

export const requireUuidParam = (req: Request, name: string, message: string): string => {
    const value = req.params[name];
    if (typeof value !== "string" || !isUuid(value)) {
        throw new BadRequestError(message);
    }
    return value;
};

export const parseBody = <T>(schema: ZodType<T>, body: unknown): T => {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => {
                const path = issue.path.join(".");
                return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
            })
            .join("; ");
        throw new ValidationError(`Invalid request body: ${issues}`);
    }
    return parsed.data;
};

export const readQueryString = (req: Request, name: string): string | undefined => {
    const value = req.query[name];
    return typeof value === "string" && value.length > 0 ? value : undefined;
};

export const readQueryInteger = (req: Request, name: string): number | undefined => {
    const value = readQueryString(req, name);
    if (value === undefined || !/^-?\d+$/.test(value)) {
        return undefined;
    }
    return Number(value);
};

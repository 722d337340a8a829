import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import {
    ConflictError,
    DomainError,
    InternalError,
    NotFoundError,
    ResultUtils,
    ValidationError,
    isDomainError,
    toDomainError,
} from "../src/index.ts";

describe("ResultUtils", () => {
    it("maps successful results and passes failures through", () => {
        const doubled = ResultUtils.map(ResultUtils.ok(21), (value) => value * 2);
        assert.deepEqual(doubled, { success: true, data: 42 });

        const error = new ValidationError("bad input");
        const failed = ResultUtils.map(ResultUtils.err(error), (value: number) => value * 2);
        assert.deepEqual(failed, { success: false, error });
    });

    it("wraps a rejected promise in an InternalError carrying the cause", async () => {
        const cause = new Error("disk full");
        const result = await ResultUtils.wrap(Promise.reject(cause), "Failed to save page");

        assert.equal(result.success, false);
        if (result.success) return;
        assert.ok(result.error instanceof InternalError);
        assert.equal(result.error.message, "Failed to save page");
        assert.equal(result.error.code, "INTERNAL_SERVER_ERROR");
        assert.equal(result.error.cause, cause);
    });

    it("keeps domain errors thrown inside a wrapped promise", async () => {
        const conflict = new ConflictError("Page route already exists");
        const result = await ResultUtils.wrap(Promise.reject(conflict));

        assert.deepEqual(result, { success: false, error: conflict });
    });
});

describe("domain errors", () => {
    it("describes a missing resource", () => {
        const error = new NotFoundError("Page", "page-1");

        assert.equal(error.message, "Page not found");
        assert.equal(error.code, "NOT_FOUND");
        assert.deepEqual(error.details, { resource: "Page", id: "page-1" });
        assert.equal(error.name, "NotFoundError");
    });

    it("records the offending field of a validation error", () => {
        assert.deepEqual(new ValidationError("Page name cannot be empty", "name").details, {
            field: "name",
        });
        assert.equal(new ValidationError("Widget IDs array cannot be empty").details, undefined);
    });

    it("converts unknown failures with the given context", () => {
        const converted = toDomainError("socket closed", "Failed to fetch page");

        assert.ok(converted instanceof InternalError);
        assert.equal(converted.message, "Failed to fetch page");
        assert.equal(isDomainError(converted), true);
        assert.equal(isDomainError(new Error("plain")), false);
    });

    it("keeps subclasses recognisable as domain errors", () => {
        const error = new ConflictError("Cannot delete the home page. Set another page as home first.", {
            pageId: "page-1",
        });

        assert.ok(error instanceof DomainError);
        assert.equal(error.code, "CONFLICT");
        assert.deepEqual(error.details, { pageId: "page-1" });
    });
});

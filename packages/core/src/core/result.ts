/**
 * Result of an operation that can fail with a domain error.
 * Narrow on `success` before reading `data` or `error`.
 */
export type Result<T, E = DomainError> =
	| { success: true; data: T }
	| { success: false; error: E };

/**
 * Helper functions for working with Result types
 */
export const ResultUtils = {
	ok<T>(data: T): Result<T, never> {
		return { success: true, data };
	},

	err<E = DomainError>(error: E): Result<never, E> {
		return { success: false, error };
	},

	async wrap<T>(promise: Promise<T>, context = "Storage operation failed"): Promise<Result<T>> {
		try {
			const data = await promise;
			return ResultUtils.ok(data);
		} catch (error) {
			return ResultUtils.err(toDomainError(error, context));
		}
	},

	map<T, U, E>(result: Result<T, E>, fn: (data: T) => U): Result<U, E> {
		if (result.success) {
			return ResultUtils.ok(fn(result.data));
		}
		return result;
	},
};

export type ErrorCode =
	| "VALIDATION_ERROR"
	| "NOT_FOUND"
	| "CONFLICT"
	| "BAD_REQUEST"
	| "INTERNAL_SERVER_ERROR";

/**
 * Domain-specific errors
 */
export class DomainError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: Record<string, unknown> | undefined;

	constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
		super(message);
		this.name = "DomainError";
		this.code = code;
		this.details = details;
	}
}

export class ValidationError extends DomainError {
	constructor(message: string, field?: string) {
		super(message, "VALIDATION_ERROR", field !== undefined ? { field } : undefined);
		this.name = "ValidationError";
	}
}

export class NotFoundError extends DomainError {
	constructor(resource: string, id?: string) {
		super(`${resource} not found`, "NOT_FOUND", { resource, id });
		this.name = "NotFoundError";
	}
}

export class ConflictError extends DomainError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, "CONFLICT", details);
		this.name = "ConflictError";
	}
}

// Raised by the HTTP layer for malformed identifiers; never by services.
export class BadRequestError extends DomainError {
	constructor(message: string) {
		super(message, "BAD_REQUEST");
		this.name = "BadRequestError";
	}
}

export class InternalError extends DomainError {
	public readonly cause: unknown;

	constructor(message: string, cause?: unknown) {
		super(message, "INTERNAL_SERVER_ERROR");
		this.name = "InternalError";
		this.cause = cause;
	}
}

export const toDomainError = (error: unknown, context: string): DomainError => {
	if (error instanceof DomainError) {
		return error;
	}
	return new InternalError(context, error);
};

export const isDomainError = (value: unknown): value is DomainError =>
	value instanceof DomainError;

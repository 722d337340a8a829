import { InternalError, type DomainError, type Logger } from "@miniapp/core";

/**
 * Storage failures are errors; rejected preconditions are expected traffic
 * and only show up at debug level.
 */
export const logFailure = (
    logger: Logger,
    action: string,
    error: DomainError,
    metadata: Record<string, unknown> = {},
): void => {
    if (error instanceof InternalError) {
        logger.error(`${action} failed: ${error.message}`, error.cause ?? error, metadata);
        return;
    }
    logger.debug(`${action} rejected: ${error.message}`, { ...metadata, code: error.code });
};

import { strict as assert } from "node:assert";
import { Logger, type DomainError, type Result } from "@miniapp/core";
import { InMemoryKeyValueAdapter } from "@miniapp/persistence-adapter";
import { createPagesModule, type PagesModule } from "../src/index.ts";

export const CLOCK_START = Date.parse("2026-01-01T00:00:00.000Z");

// Each reading of the clock is one second after the previous one.
export const steppingClock = (): (() => Date) => {
    let tick = 0;
    return () => new Date(CLOCK_START + 1000 * tick++);
};

export const secondsAfterStart = (seconds: number): string =>
    new Date(CLOCK_START + seconds * 1000).toISOString();

export type TestPages = PagesModule & {
    adapter: InMemoryKeyValueAdapter<unknown>;
};

export const createTestPages = (
    adapter: InMemoryKeyValueAdapter<unknown> = new InMemoryKeyValueAdapter(),
): TestPages => {
    const pages = createPagesModule(adapter, {
        now: steppingClock(),
        logger: new Logger("error", "miniapp-test"),
    });
    return { ...pages, adapter };
};

export const expectOk = <T>(result: Result<T>): T => {
    if (!result.success) {
        assert.fail(`expected success, got ${result.error.code}: ${result.error.message}`);
    }
    return result.data;
};

export const expectError = <T>(result: Result<T>): DomainError => {
    if (result.success) {
        assert.fail("expected a failed result");
    }
    return result.error;
};

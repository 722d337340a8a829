import type {
    BatchOperation,
    IteratorOptions,
    KeyValueAdapter,
    KeyValueIterator,
} from "./index.ts";

const createIterator = <V>(entries: Array<[string, V]>): KeyValueIterator<string, V> => {
    let closed = false;
    const generator = async function* (): AsyncIterableIterator<[string, V]> {
        for (const entry of entries) {
            if (closed) {
                return;
            }
            yield entry;
        }
    };
    const iterator = generator();
    return Object.assign(iterator, {
        close: async () => {
            closed = true;
        },
    });
};

const compareKeys = (left: string, right: string): number => {
    if (left === right) return 0;
    return left < right ? -1 : 1;
};

/**
 * Map-backed adapter used by tests and by the `memory` database driver.
 * Values are deep-copied on the way in and out so callers never share
 * references with the store.
 */
export class InMemoryKeyValueAdapter<V = unknown> implements KeyValueAdapter<string, V> {
    private store = new Map<string, V>();
    private isOpen = false;

    async open(): Promise<void> {
        this.isOpen = true;
    }

    async close(): Promise<void> {
        this.isOpen = false;
    }

    private ensureOpen(): void {
        if (!this.isOpen) {
            throw new Error("Database is not open");
        }
    }

    async get(key: string): Promise<V | undefined> {
        this.ensureOpen();
        const value = this.store.get(key);
        return value === undefined ? undefined : structuredClone(value);
    }

    async put(key: string, value: V): Promise<void> {
        this.ensureOpen();
        this.store.set(key, structuredClone(value));
    }

    async del(key: string): Promise<void> {
        this.ensureOpen();
        this.store.delete(key);
    }

    iterator(options: IteratorOptions<string> = {}): KeyValueIterator<string, V> {
        this.ensureOpen();
        const { gte, lte, reverse, limit } = options;
        const entries = Array.from(this.store.entries())
            .filter(([key]) => (gte === undefined || key >= gte) && (lte === undefined || key <= lte))
            .sort(([left], [right]) => compareKeys(left, right))
            .map(([key, value]): [string, V] => [key, structuredClone(value)]);
        const ordered = reverse ? entries.reverse() : entries;
        const limited = limit !== undefined && limit >= 0 ? ordered.slice(0, limit) : ordered;
        return createIterator(limited);
    }

    async batch(ops: ReadonlyArray<BatchOperation<string, V>>): Promise<void> {
        this.ensureOpen();
        // Copy first so a value that cannot be cloned fails before anything is applied.
        const prepared = ops.map((op) =>
            op.type === "put" ? { ...op, value: structuredClone(op.value) } : op,
        );
        for (const op of prepared) {
            if (op.type === "put") {
                this.store.set(op.key, op.value);
            } else {
                this.store.delete(op.key);
            }
        }
    }

    size(): number {
        return this.store.size;
    }
}

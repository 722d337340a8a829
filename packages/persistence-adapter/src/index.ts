export type BatchOperation<K = string, V = unknown> =
    | { type: "put"; key: K; value: V }
    | { type: "del"; key: K };

export interface KeyValueIterator<K = string, V = unknown>
    extends AsyncIterableIterator<[K, V]> {
    close(): Promise<void>;
}

export type IteratorOptions<K = string> = {
    gte?: K;
    lte?: K;
    reverse?: boolean;
    limit?: number;
};

/**
 * Minimal contract every storage backend implements.
 * `get` resolves `undefined` for a missing key; `batch` applies all
 * operations or none.
 */
export interface KeyValueAdapter<K = string, V = unknown> {
    open(): Promise<void>;
    close(): Promise<void>;
    get(key: K): Promise<V | undefined>;
    put(key: K, value: V): Promise<void>;
    del(key: K): Promise<void>;
    iterator(options?: IteratorOptions<K>): KeyValueIterator<K, V>;
    batch(ops: ReadonlyArray<BatchOperation<K, V>>): Promise<void>;
}

// Highest code unit, used as the upper bound of a prefix range.
export const PREFIX_UPPER_BOUND = "\uffff";

export const prefixRange = (prefix: string): IteratorOptions<string> => ({
    gte: prefix,
    lte: `${prefix}${PREFIX_UPPER_BOUND}`,
});

export const collectByPrefix = async <V>(
    adapter: KeyValueAdapter<string, V>,
    prefix: string,
): Promise<Array<[string, V]>> => {
    const entries: Array<[string, V]> = [];
    const iterator = adapter.iterator(prefixRange(prefix));
    try {
        for await (const entry of iterator) {
            entries.push(entry);
        }
    } finally {
        await iterator.close();
    }
    return entries;
};

export * from "./in-memory-adapter.ts";
export * from "./transaction.ts";

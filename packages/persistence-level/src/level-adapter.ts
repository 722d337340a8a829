import { Level } from "level";
import type {
    BatchOperation,
    IteratorOptions,
    KeyValueAdapter,
    KeyValueIterator,
} from "@miniapp/persistence-adapter";

const isNotFoundError = (error: unknown): boolean =>
    typeof error === "object"
    && error !== null
    && "code" in error
    && error.code === "LEVEL_NOT_FOUND";

/**
 * LevelDB-backed adapter. Values are stored JSON-encoded.
 */
export class LevelKeyValueAdapter<V = unknown> implements KeyValueAdapter<string, V> {
    private db: Level<string, V>;
    private isOpen = false;

    constructor(dbPath: string) {
        this.db = new Level<string, V>(dbPath, { valueEncoding: "json" });
    }

    async open(): Promise<void> {
        if (this.isOpen) return;
        await this.db.open();
        this.isOpen = true;
    }

    async close(): Promise<void> {
        if (!this.isOpen) return;
        await this.db.close();
        this.isOpen = false;
    }

    async get(key: string): Promise<V | undefined> {
        await this.open();
        try {
            const value = await this.db.get(key);
            return value ?? undefined;
        } catch (error) {
            if (isNotFoundError(error)) {
                return undefined;
            }
            throw error;
        }
    }

    async put(key: string, value: V): Promise<void> {
        await this.open();
        await this.db.put(key, value);
    }

    async del(key: string): Promise<void> {
        await this.open();
        await this.db.del(key);
    }

    iterator(options: IteratorOptions<string> = {}): KeyValueIterator<string, V> {
        const db = this.db;
        const ready = this.open();
        let levelIterator: ReturnType<typeof db.iterator<string, V>> | undefined;

        const generator = async function* (): AsyncIterableIterator<[string, V]> {
            await ready;
            levelIterator = db.iterator<string, V>({ ...options });
            for await (const entry of levelIterator) {
                yield entry;
            }
        };

        const iterator = generator();
        return Object.assign(iterator, {
            close: async () => {
                await iterator.return?.(undefined);
                if (levelIterator) {
                    await levelIterator.close();
                }
            },
        });
    }

    async batch(ops: ReadonlyArray<BatchOperation<string, V>>): Promise<void> {
        await this.open();
        await this.db.batch(
            ops.map((op) =>
                op.type === "put"
                    ? { type: "put" as const, key: op.key, value: op.value }
                    : { type: "del" as const, key: op.key },
            ),
        );
    }
}

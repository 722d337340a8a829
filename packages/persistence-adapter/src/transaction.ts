import {
    prefixRange,
    type BatchOperation,
    type KeyValueAdapter,
} from "./index.ts";

/**
 * Database transaction wrapper for atomic operations.
 * Writes are buffered and applied with a single `batch` on commit; reads see
 * the transaction's own pending writes.
 */

export interface TransactionOptions {
    retryAttempts?: number; // Commit attempts before giving up
}

export class TransactionError extends Error {
    constructor(
        message: string,
        public readonly code: "ROLLBACK" | "ABORT",
    ) {
        super(message);
        this.name = "TransactionError";
    }
}

type PendingWrite<V> = { type: "put"; value: V } | { type: "del" };

export class Transaction<V = unknown> {
    private pending = new Map<string, PendingWrite<V>>();
    private isCommitted = false;
    private isAborted = false;

    constructor(
        private adapter: KeyValueAdapter<string, V>,
        private options: TransactionOptions = {},
    ) {}

    private assertPending(): void {
        if (this.isCommitted || this.isAborted) {
            throw new TransactionError("Transaction is already completed", "ABORT");
        }
    }

    /**
     * Add a put operation to the transaction
     */
    put(key: string, value: V): Transaction<V> {
        this.assertPending();
        this.pending.set(key, { type: "put", value });
        return this;
    }

    /**
     * Add a delete operation to the transaction
     */
    del(key: string): Transaction<V> {
        this.assertPending();
        this.pending.set(key, { type: "del" });
        return this;
    }

    async get(key: string): Promise<V | undefined> {
        this.assertPending();
        const write = this.pending.get(key);
        if (write) {
            return write.type === "put" ? write.value : undefined;
        }
        return this.adapter.get(key);
    }

    /**
     * Entries under a key prefix, merged with pending writes, in key order.
     */
    async scan(prefix: string): Promise<Array<[string, V]>> {
        this.assertPending();
        const merged = new Map<string, V>();
        const iterator = this.adapter.iterator(prefixRange(prefix));
        try {
            for await (const [key, value] of iterator) {
                merged.set(key, value);
            }
        } finally {
            await iterator.close();
        }
        for (const [key, write] of this.pending) {
            if (!key.startsWith(prefix)) continue;
            if (write.type === "put") {
                merged.set(key, write.value);
            } else {
                merged.delete(key);
            }
        }
        return Array.from(merged.entries()).sort(([left], [right]) =>
            left < right ? -1 : left > right ? 1 : 0,
        );
    }

    private operations(): BatchOperation<string, V>[] {
        return Array.from(this.pending.entries()).map(([key, write]) =>
            write.type === "put" ? { type: "put", key, value: write.value } : { type: "del", key },
        );
    }

    /**
     * Execute the transaction
     */
    async commit(): Promise<void> {
        this.assertPending();

        const operations = this.operations();
        if (operations.length === 0) {
            this.isCommitted = true;
            return;
        }

        const retryAttempts = Math.max(1, this.options.retryAttempts ?? 1);
        let lastError: unknown;

        for (let attempt = 0; attempt < retryAttempts; attempt++) {
            try {
                await this.adapter.batch(operations);
                this.isCommitted = true;
                return;
            } catch (error) {
                lastError = error;
                if (attempt < retryAttempts - 1) {
                    // Exponential backoff
                    const backoffMs = Math.pow(2, attempt) * 50;
                    await new Promise((resolve) => setTimeout(resolve, backoffMs));
                }
            }
        }

        this.isAborted = true;
        this.pending.clear();
        const reason = lastError instanceof Error ? lastError.message : String(lastError);
        throw new TransactionError(
            `Transaction failed after ${retryAttempts} attempt(s): ${reason}`,
            "ROLLBACK",
        );
    }

    /**
     * Abort the transaction
     */
    abort(): void {
        if (this.isCommitted || this.isAborted) {
            return;
        }

        this.isAborted = true;
        this.pending.clear();
    }

    getStatus(): "pending" | "committed" | "aborted" {
        if (this.isCommitted) return "committed";
        if (this.isAborted) return "aborted";
        return "pending";
    }

    getOperationCount(): number {
        return this.pending.size;
    }
}

/**
 * Runs transactions against one adapter one at a time, in arrival order, so
 * a transaction's reads and its commit are never interleaved with another
 * transaction's.
 */
export class TransactionManager<V = unknown> {
    private queue: Promise<void> = Promise.resolve();
    private activeTransactions = 0;

    constructor(private adapter: KeyValueAdapter<string, V>) {}

    createTransaction(options?: TransactionOptions): Transaction<V> {
        return new Transaction(this.adapter, options);
    }

    /**
     * Execute a function within a transaction. The transaction commits when
     * `fn` resolves and is aborted when it throws.
     */
    async executeTransaction<T>(
        fn: (tx: Transaction<V>) => Promise<T>,
        options: TransactionOptions = {},
    ): Promise<T> {
        const previous = this.queue;
        let release: () => void = () => undefined;
        this.queue = new Promise<void>((resolve) => {
            release = resolve;
        });
        await previous;
        try {
            return await this.run(fn, options);
        } finally {
            release();
        }
    }

    private async run<T>(
        fn: (tx: Transaction<V>) => Promise<T>,
        options: TransactionOptions,
    ): Promise<T> {
        const tx = this.createTransaction(options);
        this.activeTransactions++;
        try {
            const result = await fn(tx);
            await tx.commit();
            return result;
        } catch (error) {
            tx.abort();
            throw error;
        } finally {
            this.activeTransactions--;
        }
    }

    getActiveTransactionCount(): number {
        return this.activeTransactions;
    }
}

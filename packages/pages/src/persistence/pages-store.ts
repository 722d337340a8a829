import { v4 as uuidv4 } from "uuid";
import {
    TransactionManager,
    type KeyValueAdapter,
    type Transaction,
    type TransactionOptions,
} from "@miniapp/persistence-adapter";

export type PagesStoreOptions = {
    now?: () => Date;
    generateId?: () => string;
    transaction?: TransactionOptions;
};

/**
 * One key-value store shared by the page and widget repositories.
 * Both repositories must run their transactions through the same
 * manager so that page and widget writes are serialized together.
 */
export class PagesStore {
    readonly transactions: TransactionManager<unknown>;
    private readonly now: () => Date;
    private readonly generateId: () => string;
    private readonly transactionOptions: TransactionOptions;
    private opening: Promise<void> | null = null;

    constructor(
        readonly adapter: KeyValueAdapter<string, unknown>,
        options: PagesStoreOptions = {},
    ) {
        this.transactions = new TransactionManager(adapter);
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? (() => uuidv4());
        this.transactionOptions = { ...options.transaction };
    }

    open(): Promise<void> {
        if (!this.opening) {
            this.opening = this.adapter.open().catch((error: unknown) => {
                this.opening = null;
                throw error;
            });
        }
        return this.opening;
    }

    async close(): Promise<void> {
        if (!this.opening) return;
        this.opening = null;
        await this.adapter.close();
    }

    timestamp(): string {
        return this.now().toISOString();
    }

    newId(): string {
        return this.generateId();
    }

    run<T>(fn: (tx: Transaction<unknown>) => Promise<T>): Promise<T> {
        return this.transactions.executeTransaction(fn, this.transactionOptions);
    }
}

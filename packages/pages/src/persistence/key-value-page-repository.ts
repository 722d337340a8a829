import { ResultUtils, type Result } from "@miniapp/core";
import { collectByPrefix, type Transaction } from "@miniapp/persistence-adapter";
import {
    PageFactory,
    comparePagesNewestFirst,
    type PageChanges,
    type PageDraft,
} from "../page-domain.ts";
import type { PageRepository, PageTransaction } from "../page-repository.ts";
import type { Page, PageWithWidgets } from "../types.ts";
import { compareWidgetsByPosition } from "../widget-domain.ts";
import type { PagesStore } from "./pages-store.ts";
import {
    HOME_PAGE_KEY,
    PAGE_PREFIX,
    StorageKeys,
    readIndexEntry,
    readPage,
    readWidgets,
} from "./storage-keys.ts";

class KeyValuePageTransaction implements PageTransaction {
    constructor(
        private readonly tx: Transaction<unknown>,
        private readonly store: PagesStore,
    ) {}

    async findById(id: string): Promise<Page | null> {
        return readPage(await this.tx.get(StorageKeys.page(id)));
    }

    async routeExists(route: string, excludeId?: string): Promise<boolean> {
        const ownerId = readIndexEntry(await this.tx.get(StorageKeys.route(route)));
        return ownerId !== null && ownerId !== excludeId;
    }

    async clearHomePage(): Promise<Page | null> {
        const homeId = readIndexEntry(await this.tx.get(HOME_PAGE_KEY));
        if (homeId === null) {
            return null;
        }
        this.tx.del(HOME_PAGE_KEY);
        const page = await this.findById(homeId);
        if (!page || !page.isHome) {
            return null;
        }
        const cleared = PageFactory.update(page, { isHome: false }, this.store.timestamp());
        this.tx.put(StorageKeys.page(cleared.id), cleared);
        return cleared;
    }

    insert(draft: PageDraft): Page {
        const page = PageFactory.create(this.store.newId(), draft, this.store.timestamp());
        this.tx.put(StorageKeys.page(page.id), page);
        this.tx.put(StorageKeys.route(page.route), page.id);
        if (page.isHome) {
            this.tx.put(HOME_PAGE_KEY, page.id);
        }
        return page;
    }

    update(page: Page, changes: PageChanges): Page {
        const next = PageFactory.update(page, changes, this.store.timestamp());
        if (next.route !== page.route) {
            this.tx.del(StorageKeys.route(page.route));
        }
        this.tx.put(StorageKeys.route(next.route), next.id);
        this.tx.put(StorageKeys.page(next.id), next);
        if (next.isHome) {
            this.tx.put(HOME_PAGE_KEY, next.id);
        } else if (page.isHome) {
            this.tx.del(HOME_PAGE_KEY);
        }
        return next;
    }

    async delete(page: Page): Promise<number> {
        const prefix = StorageKeys.widgetsOfPage(page.id);
        const widgets = await this.tx.scan(prefix);
        for (const [key] of widgets) {
            this.tx.del(key);
            this.tx.del(StorageKeys.widgetIndex(key.slice(prefix.length)));
        }
        this.tx.del(StorageKeys.page(page.id));
        this.tx.del(StorageKeys.route(page.route));
        if (page.isHome) {
            this.tx.del(HOME_PAGE_KEY);
        }
        return widgets.length;
    }
}

/**
 * Page repository over the shared key-value store. The route index and the
 * home-page pointer are written in the same batch as the page records.
 */
export class KeyValuePageRepository implements PageRepository {
    constructor(private readonly store: PagesStore) {}

    private execute<T>(context: string, operation: () => Promise<T>): Promise<Result<T>> {
        return ResultUtils.wrap(this.store.open().then(operation), context);
    }

    transaction<T>(
        fn: (tx: PageTransaction) => Promise<T>,
        context = "Failed to save page",
    ): Promise<Result<T>> {
        return this.execute(context, () =>
            this.store.run((tx) => fn(new KeyValuePageTransaction(tx, this.store))),
        );
    }

    findById(id: string): Promise<Result<Page | null>> {
        return this.execute("Failed to fetch page", async () =>
            readPage(await this.store.adapter.get(StorageKeys.page(id))),
        );
    }

    findByIdWithWidgets(id: string): Promise<Result<PageWithWidgets | null>> {
        return this.execute("Failed to fetch page", async () => {
            const page = readPage(await this.store.adapter.get(StorageKeys.page(id)));
            if (!page) {
                return null;
            }
            const entries = await collectByPrefix(this.store.adapter, StorageKeys.widgetsOfPage(id));
            const widgets = readWidgets(entries).sort(compareWidgetsByPosition);
            return { ...page, widgets };
        });
    }

    findHomePage(): Promise<Result<Page | null>> {
        return this.execute("Failed to fetch home page", async () => {
            const homeId = readIndexEntry(await this.store.adapter.get(HOME_PAGE_KEY));
            if (homeId === null) {
                return null;
            }
            const page = readPage(await this.store.adapter.get(StorageKeys.page(homeId)));
            return page && page.isHome ? page : null;
        });
    }

    findAll(offset: number, limit: number): Promise<Result<{ pages: Page[]; total: number }>> {
        return this.execute("Failed to fetch pages", async () => {
            const entries = await collectByPrefix(this.store.adapter, PAGE_PREFIX);
            const pages = entries
                .map(([, value]) => readPage(value))
                .filter((page): page is Page => page !== null)
                .sort(comparePagesNewestFirst);
            return {
                pages: pages.slice(offset, offset + limit),
                total: pages.length,
            };
        });
    }

    routeExists(route: string, excludeId?: string): Promise<Result<boolean>> {
        return this.execute("Failed to check route", async () => {
            const ownerId = readIndexEntry(await this.store.adapter.get(StorageKeys.route(route)));
            return ownerId !== null && ownerId !== excludeId;
        });
    }
}

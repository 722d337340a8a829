import { NotFoundError, ResultUtils, type Result } from "@miniapp/core";
import { collectByPrefix, type Transaction } from "@miniapp/persistence-adapter";
import type { Widget, WidgetType } from "../types.ts";
import {
    WidgetFactory,
    compareWidgetsByPosition,
    type WidgetChanges,
    type WidgetDraft,
} from "../widget-domain.ts";
import type { WidgetRepository, WidgetTransaction } from "../widget-repository.ts";
import type { PagesStore } from "./pages-store.ts";
import { StorageKeys, readIndexEntry, readPage, readWidget, readWidgets } from "./storage-keys.ts";

const highestPosition = (widgets: readonly Widget[]): number =>
    widgets.reduce((max, widget) => Math.max(max, widget.position), 0);

class KeyValueWidgetTransaction implements WidgetTransaction {
    constructor(
        private readonly tx: Transaction<unknown>,
        private readonly store: PagesStore,
    ) {}

    private async widgetsOf(pageId: string): Promise<Widget[]> {
        return readWidgets(await this.tx.scan(StorageKeys.widgetsOfPage(pageId)));
    }

    async findById(id: string): Promise<Widget | null> {
        const pageId = readIndexEntry(await this.tx.get(StorageKeys.widgetIndex(id)));
        if (pageId === null) {
            return null;
        }
        return readWidget(await this.tx.get(StorageKeys.widget(pageId, id)));
    }

    async maxPosition(pageId: string): Promise<number> {
        return highestPosition(await this.widgetsOf(pageId));
    }

    async countByPage(pageId: string): Promise<number> {
        return (await this.widgetsOf(pageId)).length;
    }

    async insert(draft: WidgetDraft): Promise<Widget> {
        const page = readPage(await this.tx.get(StorageKeys.page(draft.pageId)));
        if (!page) {
            throw new NotFoundError("Page", draft.pageId);
        }
        const position = draft.position === 0
            ? (await this.maxPosition(draft.pageId)) + 1
            : draft.position;
        const widget = WidgetFactory.create(this.store.newId(), draft, position, this.store.timestamp());
        this.tx.put(StorageKeys.widget(widget.pageId, widget.id), widget);
        this.tx.put(StorageKeys.widgetIndex(widget.id), widget.pageId);
        return widget;
    }

    update(widget: Widget, changes: WidgetChanges): Widget {
        const next = WidgetFactory.update(widget, changes, this.store.timestamp());
        this.tx.put(StorageKeys.widget(next.pageId, next.id), next);
        return next;
    }

    delete(widget: Widget): void {
        this.tx.del(StorageKeys.widget(widget.pageId, widget.id));
        this.tx.del(StorageKeys.widgetIndex(widget.id));
    }

    async setPosition(pageId: string, widgetId: string, position: number): Promise<boolean> {
        const key = StorageKeys.widget(pageId, widgetId);
        const widget = readWidget(await this.tx.get(key));
        if (!widget) {
            return false;
        }
        this.tx.put(key, WidgetFactory.update(widget, { position }, this.store.timestamp()));
        return true;
    }
}

/**
 * Widget repository over the shared key-value store. Widgets live under
 * their page's key prefix, so a page scan returns exactly its widgets.
 */
export class KeyValueWidgetRepository implements WidgetRepository {
    constructor(private readonly store: PagesStore) {}

    private execute<T>(context: string, operation: () => Promise<T>): Promise<Result<T>> {
        return ResultUtils.wrap(this.store.open().then(operation), context);
    }

    private async widgetsOf(pageId: string): Promise<Widget[]> {
        const entries = await collectByPrefix(this.store.adapter, StorageKeys.widgetsOfPage(pageId));
        return readWidgets(entries);
    }

    transaction<T>(
        fn: (tx: WidgetTransaction) => Promise<T>,
        context = "Failed to save widget",
    ): Promise<Result<T>> {
        return this.execute(context, () =>
            this.store.run((tx) => fn(new KeyValueWidgetTransaction(tx, this.store))),
        );
    }

    findById(id: string): Promise<Result<Widget | null>> {
        return this.execute("Failed to fetch widget", async () => {
            const pageId = readIndexEntry(await this.store.adapter.get(StorageKeys.widgetIndex(id)));
            if (pageId === null) {
                return null;
            }
            return readWidget(await this.store.adapter.get(StorageKeys.widget(pageId, id)));
        });
    }

    findByPage(pageId: string, type?: WidgetType): Promise<Result<Widget[]>> {
        return this.execute("Failed to fetch widgets", async () => {
            const widgets = await this.widgetsOf(pageId);
            return widgets
                .filter((widget) => type === undefined || widget.type === type)
                .sort(compareWidgetsByPosition);
        });
    }

    countByPage(pageId: string): Promise<Result<number>> {
        return this.execute("Failed to count widgets", async () => (await this.widgetsOf(pageId)).length);
    }

    maxPositionByPage(pageId: string): Promise<Result<number>> {
        return this.execute("Failed to determine widget position", async () =>
            highestPosition(await this.widgetsOf(pageId)),
        );
    }
}

import type { Result } from "@miniapp/core";
import type { WidgetChanges, WidgetDraft } from "./widget-domain.ts";
import type { Widget, WidgetType } from "./types.ts";

/* eslint-disable no-unused-vars */
export type WidgetTransaction = {
    findById(id: string): Promise<Widget | null>;
    maxPosition(pageId: string): Promise<number>;
    countByPage(pageId: string): Promise<number>;
    /**
     * Stores a new widget. A draft position of 0 takes the slot after the
     * page's current maximum. Rejects with a NotFoundError when the owning
     * page does not exist.
     */
    insert(draft: WidgetDraft): Promise<Widget>;
    update(widget: Widget, changes: WidgetChanges): Widget;
    delete(widget: Widget): void;
    /**
     * Moves the widget keyed by both ids; resolves false when no widget
     * matches that pair.
     */
    setPosition(pageId: string, widgetId: string, position: number): Promise<boolean>;
};

export type WidgetRepository = {
    transaction<T>(fn: (tx: WidgetTransaction) => Promise<T>, context?: string): Promise<Result<T>>;
    findById(id: string): Promise<Result<Widget | null>>;
    findByPage(pageId: string, type?: WidgetType): Promise<Result<Widget[]>>;
    countByPage(pageId: string): Promise<Result<number>>;
    maxPositionByPage(pageId: string): Promise<Result<number>>;
};
/* eslint-enable no-unused-vars */

import { z } from "zod";
import { PageSchema, WidgetSchema, type Page, type Widget } from "../types.ts";

export const PAGE_PREFIX = "page:";
export const ROUTE_INDEX_PREFIX = "route-index:";
export const HOME_PAGE_KEY = "home-page";
export const WIDGET_PREFIX = "widget:";
export const WIDGET_INDEX_PREFIX = "widget-index:";

export const StorageKeys = {
    page: (pageId: string): string => `${PAGE_PREFIX}${pageId}`,
    route: (route: string): string => `${ROUTE_INDEX_PREFIX}${route}`,
    widget: (pageId: string, widgetId: string): string => `${WIDGET_PREFIX}${pageId}:${widgetId}`,
    widgetsOfPage: (pageId: string): string => `${WIDGET_PREFIX}${pageId}:`,
    widgetIndex: (widgetId: string): string => `${WIDGET_INDEX_PREFIX}${widgetId}`,
};

const IndexEntrySchema = z.string().min(1);

export const readPage = (value: unknown): Page | null => {
    const parsed = PageSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
};

export const readWidget = (value: unknown): Widget | null => {
    const parsed = WidgetSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
};

export const readIndexEntry = (value: unknown): string | null => {
    const parsed = IndexEntrySchema.safeParse(value);
    return parsed.success ? parsed.data : null;
};

export const readWidgets = (entries: ReadonlyArray<[string, unknown]>): Widget[] =>
    entries
        .map(([, value]) => readWidget(value))
        .filter((widget): widget is Widget => widget !== null);

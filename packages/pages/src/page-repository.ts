import type { Result } from "@miniapp/core";
import type { PageChanges, PageDraft } from "./page-domain.ts";
import type { Page, PageWithWidgets } from "./types.ts";

/**
 * Page reads and writes scoped to one storage transaction. Writes become
 * visible to later reads in the same transaction and are committed together.
 */
/* eslint-disable no-unused-vars */
export type PageTransaction = {
    findById(id: string): Promise<Page | null>;
    routeExists(route: string, excludeId?: string): Promise<boolean>;
    // Clears the home flag from the current home page and returns it as written.
    clearHomePage(): Promise<Page | null>;
    insert(draft: PageDraft): Page;
    update(page: Page, changes: PageChanges): Page;
    // Removes the page with every widget it owns; resolves the widget count.
    delete(page: Page): Promise<number>;
};

/**
 * Repository interface for page data access
 */
export type PageRepository = {
    transaction<T>(fn: (tx: PageTransaction) => Promise<T>, context?: string): Promise<Result<T>>;
    findById(id: string): Promise<Result<Page | null>>;
    findByIdWithWidgets(id: string): Promise<Result<PageWithWidgets | null>>;
    findHomePage(): Promise<Result<Page | null>>;
    findAll(offset: number, limit: number): Promise<Result<{ pages: Page[]; total: number }>>;
    routeExists(route: string, excludeId?: string): Promise<Result<boolean>>;
};
/* eslint-enable no-unused-vars */

import { logger as defaultLogger, type Logger } from "@miniapp/core";
import type { KeyValueAdapter } from "@miniapp/persistence-adapter";
import { PageDirectory } from "./page-directory.ts";
import type { PageRepository } from "./page-repository.ts";
import { KeyValuePageRepository } from "./persistence/key-value-page-repository.ts";
import { KeyValueWidgetRepository } from "./persistence/key-value-widget-repository.ts";
import { PagesStore, type PagesStoreOptions } from "./persistence/pages-store.ts";
import { WidgetSequencer } from "./widget-sequencer.ts";
import type { WidgetRepository } from "./widget-repository.ts";

export type PagesModuleOptions = PagesStoreOptions & {
    logger?: Logger;
};

export type PagesModule = {
    store: PagesStore;
    pageRepository: PageRepository;
    widgetRepository: WidgetRepository;
    pageDirectory: PageDirectory;
    widgetSequencer: WidgetSequencer;
    open(): Promise<void>;
    close(): Promise<void>;
};

/**
 * Wires both services over one adapter. The repositories share a single
 * store so their transactions run through the same queue.
 */
export const createPagesModule = (
    adapter: KeyValueAdapter<string, unknown>,
    options: PagesModuleOptions = {},
): PagesModule => {
    const { logger = defaultLogger, ...storeOptions } = options;
    const store = new PagesStore(adapter, storeOptions);
    const pageRepository = new KeyValuePageRepository(store);
    const widgetRepository = new KeyValueWidgetRepository(store);

    return {
        store,
        pageRepository,
        widgetRepository,
        pageDirectory: new PageDirectory(pageRepository, logger),
        widgetSequencer: new WidgetSequencer(widgetRepository, pageRepository, logger),
        open: () => store.open(),
        close: () => store.close(),
    };
};

import {
    ConflictError,
    NotFoundError,
    ResultUtils,
    logger as defaultLogger,
    type Logger,
    type Result,
} from "@miniapp/core";
import { PageDomainRules } from "./page-domain.ts";
import type { PageRepository } from "./page-repository.ts";
import { logFailure } from "./service-logging.ts";
import type {
    CreatePageInput,
    Page,
    PageList,
    PageListOptions,
    PageWithWidgets,
    UpdatePageInput,
} from "./types.ts";

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

/**
 * Falls back to the defaults for anything that is not a usable page number
 * or page size.
 */
export const normalizeListOptions = (options: Partial<PageListOptions>): PageListOptions => {
    const page = options.page;
    const perPage = options.perPage;
    return {
        page: page !== undefined && Number.isInteger(page) && page >= 1 ? page : DEFAULT_PAGE,
        perPage:
            perPage !== undefined && Number.isInteger(perPage) && perPage >= 1 && perPage <= MAX_PER_PAGE
                ? perPage
                : DEFAULT_PER_PAGE,
    };
};

/* eslint-disable no-unused-vars */
export type PageDirectoryApi = {
    createPage(input: CreatePageInput): Promise<Result<Page>>;
    updatePage(id: string, input: UpdatePageInput): Promise<Result<Page>>;
    deletePage(id: string): Promise<Result<void>>;
    getPage(id: string): Promise<Result<Page>>;
    getPageWithWidgets(id: string): Promise<Result<PageWithWidgets | null>>;
    getHomePage(): Promise<Result<Page | null>>;
    listPages(options: Partial<PageListOptions>): Promise<Result<PageList>>;
};
/* eslint-enable no-unused-vars */

/**
 * Owns the set of pages and keeps at most one of them flagged as home.
 * Every check that guards a write runs inside the same storage transaction
 * as the write, so concurrent requests cannot both pass it.
 */
export class PageDirectory implements PageDirectoryApi {
    private readonly pageRepository: PageRepository;
    private readonly logger: Logger;

    constructor(pageRepository: PageRepository, logger: Logger = defaultLogger) {
        this.pageRepository = pageRepository;
        this.logger = logger.child({ component: "page-directory" });
    }

    async createPage(input: CreatePageInput): Promise<Result<Page>> {
        const validation = PageDomainRules.validateCreateInput(input);
        if (!validation.success) {
            logFailure(this.logger, "Page create", validation.error);
            return validation;
        }
        const draft = validation.data;

        const result = await this.pageRepository.transaction(async (tx) => {
            if (await tx.routeExists(draft.route)) {
                throw new ConflictError("Page route already exists", { field: "route", route: draft.route });
            }
            const previousHome = draft.isHome ? await tx.clearHomePage() : null;
            return { page: tx.insert(draft), previousHome };
        }, "Failed to create page");

        if (!result.success) {
            logFailure(this.logger, "Page create", result.error, { route: draft.route });
            return result;
        }

        const { page, previousHome } = result.data;
        if (previousHome) {
            this.logger.info("Home page reassigned", {
                pageId: page.id,
                previousHomePageId: previousHome.id,
            });
        }
        this.logger.info("Page created", { pageId: page.id, route: page.route });
        return ResultUtils.ok(page);
    }

    async updatePage(id: string, input: UpdatePageInput): Promise<Result<Page>> {
        const result = await this.pageRepository.transaction(async (tx) => {
            const existing = await tx.findById(id);
            if (!existing) {
                throw new NotFoundError("Page", id);
            }

            const validation = PageDomainRules.validateUpdateInput(input);
            if (!validation.success) {
                throw validation.error;
            }
            const changes = validation.data;
            if (!PageDomainRules.hasChanges(changes)) {
                return { page: existing, changed: false };
            }

            if (changes.route !== undefined && (await tx.routeExists(changes.route, id))) {
                throw new ConflictError("Page route already exists", { field: "route", route: changes.route });
            }
            if (changes.isHome === true && !existing.isHome) {
                await tx.clearHomePage();
            }
            return { page: tx.update(existing, changes), changed: true };
        }, "Failed to update page");

        if (!result.success) {
            logFailure(this.logger, "Page update", result.error, { pageId: id });
            return result;
        }
        if (result.data.changed) {
            this.logger.info("Page updated", { pageId: id });
        }
        return ResultUtils.ok(result.data.page);
    }

    async deletePage(id: string): Promise<Result<void>> {
        const result = await this.pageRepository.transaction(async (tx) => {
            const existing = await tx.findById(id);
            if (!existing) {
                throw new NotFoundError("Page", id);
            }
            if (!PageDomainRules.canDelete(existing)) {
                throw new ConflictError(
                    "Cannot delete the home page. Set another page as home first.",
                    { pageId: id },
                );
            }
            return tx.delete(existing);
        }, "Failed to delete page");

        if (!result.success) {
            logFailure(this.logger, "Page delete", result.error, { pageId: id });
            return result;
        }
        this.logger.info("Page deleted", { pageId: id, widgetsRemoved: result.data });
        return ResultUtils.ok(undefined);
    }

    async getPage(id: string): Promise<Result<Page>> {
        const result = await this.pageRepository.findById(id);
        if (!result.success) {
            logFailure(this.logger, "Page lookup", result.error, { pageId: id });
            return result;
        }
        if (!result.data) {
            return ResultUtils.err(new NotFoundError("Page", id));
        }
        return ResultUtils.ok(result.data);
    }

    async getPageWithWidgets(id: string): Promise<Result<PageWithWidgets | null>> {
        const result = await this.pageRepository.findByIdWithWidgets(id);
        if (!result.success) {
            logFailure(this.logger, "Page lookup", result.error, { pageId: id });
        }
        return result;
    }

    async getHomePage(): Promise<Result<Page | null>> {
        return this.pageRepository.findHomePage();
    }

    async listPages(options: Partial<PageListOptions>): Promise<Result<PageList>> {
        const { page, perPage } = normalizeListOptions(options);
        const result = await this.pageRepository.findAll((page - 1) * perPage, perPage);
        if (!result.success) {
            logFailure(this.logger, "Page list", result.error);
            return result;
        }
        return ResultUtils.ok({
            pages: result.data.pages,
            total: result.data.total,
            page,
            perPage,
            totalPages: Math.ceil(result.data.total / perPage),
        });
    }
}

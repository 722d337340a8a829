import {
    ConflictError,
    NotFoundError,
    ResultUtils,
    ValidationError,
    logger as defaultLogger,
    type Logger,
    type Result,
} from "@miniapp/core";
import type { PageRepository } from "./page-repository.ts";
import { logFailure } from "./service-logging.ts";
import type { Page, Widget, WidgetType } from "./types.ts";
import {
    WidgetDomainRules,
    type CreateWidgetInput,
    type UpdateWidgetInput,
} from "./widget-domain.ts";
import type { WidgetRepository } from "./widget-repository.ts";

/* eslint-disable no-unused-vars */
export type WidgetSequencerApi = {
    createWidget(input: CreateWidgetInput): Promise<Result<Widget>>;
    updateWidget(id: string, input: UpdateWidgetInput): Promise<Result<Widget>>;
    deleteWidget(id: string): Promise<Result<void>>;
    reorderWidgets(pageId: string, widgetIds: readonly string[]): Promise<Result<Widget[]>>;
    getWidgetsByPage(pageId: string, typeFilter?: string): Promise<Result<Widget[]>>;
    getWidget(id: string): Promise<Result<Widget>>;
    countByPage(pageId: string): Promise<Result<number>>;
    maxPositionByPage(pageId: string): Promise<Result<number>>;
};
/* eslint-enable no-unused-vars */

/**
 * Owns the order of widgets within each page.
 *
 * A reorder names every widget of the page exactly once; position `i + 1`
 * is written to the widget at index `i`. The count check and the whole list
 * are applied in one transaction, and an id that does not belong to the page
 * aborts it with nothing written.
 */
export class WidgetSequencer implements WidgetSequencerApi {
    private readonly widgetRepository: WidgetRepository;
    private readonly pageRepository: PageRepository;
    private readonly logger: Logger;

    constructor(
        widgetRepository: WidgetRepository,
        pageRepository: PageRepository,
        logger: Logger = defaultLogger,
    ) {
        this.widgetRepository = widgetRepository;
        this.pageRepository = pageRepository;
        this.logger = logger.child({ component: "widget-sequencer" });
    }

    private async requirePage(pageId: string): Promise<Result<Page>> {
        const result = await this.pageRepository.findById(pageId);
        if (!result.success) {
            return result;
        }
        if (!result.data) {
            return ResultUtils.err(new NotFoundError("Page", pageId));
        }
        return ResultUtils.ok(result.data);
    }

    async createWidget(input: CreateWidgetInput): Promise<Result<Widget>> {
        const page = await this.requirePage(input.pageId);
        if (!page.success) {
            logFailure(this.logger, "Widget create", page.error, { pageId: input.pageId });
            return page;
        }

        const validation = WidgetDomainRules.validateCreateInput(input);
        if (!validation.success) {
            logFailure(this.logger, "Widget create", validation.error, { pageId: input.pageId });
            return validation;
        }

        const draft = validation.data;
        const result = await this.widgetRepository.transaction(
            (tx) => tx.insert(draft),
            "Failed to create widget",
        );
        if (!result.success) {
            logFailure(this.logger, "Widget create", result.error, { pageId: input.pageId });
            return result;
        }

        this.logger.info("Widget created", {
            pageId: result.data.pageId,
            widgetId: result.data.id,
            type: result.data.type,
            position: result.data.position,
        });
        return result;
    }

    async updateWidget(id: string, input: UpdateWidgetInput): Promise<Result<Widget>> {
        const result = await this.widgetRepository.transaction(async (tx) => {
            const existing = await tx.findById(id);
            if (!existing) {
                throw new NotFoundError("Widget", id);
            }
            const validation = WidgetDomainRules.validateUpdateInput(input);
            if (!validation.success) {
                throw validation.error;
            }
            if (!WidgetDomainRules.hasChanges(validation.data)) {
                return existing;
            }
            return tx.update(existing, validation.data);
        }, "Failed to update widget");

        if (!result.success) {
            logFailure(this.logger, "Widget update", result.error, { widgetId: id });
            return result;
        }
        this.logger.info("Widget updated", { pageId: result.data.pageId, widgetId: id });
        return result;
    }

    async deleteWidget(id: string): Promise<Result<void>> {
        const result = await this.widgetRepository.transaction(async (tx) => {
            const existing = await tx.findById(id);
            if (!existing) {
                throw new NotFoundError("Widget", id);
            }
            tx.delete(existing);
            return existing;
        }, "Failed to delete widget");

        if (!result.success) {
            logFailure(this.logger, "Widget delete", result.error, { widgetId: id });
            return result;
        }
        this.logger.info("Widget deleted", { pageId: result.data.pageId, widgetId: id });
        return ResultUtils.ok(undefined);
    }

    async reorderWidgets(pageId: string, widgetIds: readonly string[]): Promise<Result<Widget[]>> {
        const done = this.logger.startTimer("reorderWidgets", { pageId });
        const result = await this.applyOrder(pageId, widgetIds);
        done();
        if (!result.success) {
            logFailure(this.logger, "Widget reorder", result.error, { pageId });
            return result;
        }
        this.logger.info("Widgets reordered", { pageId, count: widgetIds.length });
        return result;
    }

    private async applyOrder(pageId: string, widgetIds: readonly string[]): Promise<Result<Widget[]>> {
        const page = await this.requirePage(pageId);
        if (!page.success) return page;

        const validation = WidgetDomainRules.validateReorder(widgetIds);
        if (!validation.success) return validation;

        const applied = await this.widgetRepository.transaction(async (tx) => {
            // Counted inside the transaction: a widget created since the call started fails the reorder.
            if ((await tx.countByPage(pageId)) !== widgetIds.length) {
                throw new ValidationError(
                    "The number of widget IDs must match the total widgets on the page",
                    "widgetIds",
                );
            }
            for (const [index, widgetId] of widgetIds.entries()) {
                const matched = await tx.setPosition(pageId, widgetId, index + 1);
                if (!matched) {
                    throw new ConflictError(`widget ${widgetId} not found on page ${pageId}`, {
                        widgetId,
                        pageId,
                    });
                }
            }
        }, "Failed to reorder widgets");
        if (!applied.success) return applied;

        return this.widgetRepository.findByPage(pageId);
    }

    async getWidgetsByPage(pageId: string, typeFilter?: string): Promise<Result<Widget[]>> {
        const page = await this.requirePage(pageId);
        if (!page.success) return page;

        let type: WidgetType | undefined;
        if (typeFilter !== undefined) {
            const parsed = WidgetDomainRules.validateTypeFilter(typeFilter);
            if (!parsed.success) return parsed;
            type = parsed.data;
        }
        return this.widgetRepository.findByPage(pageId, type);
    }

    async getWidget(id: string): Promise<Result<Widget>> {
        const result = await this.widgetRepository.findById(id);
        if (!result.success) return result;
        if (!result.data) {
            return ResultUtils.err(new NotFoundError("Widget", id));
        }
        return ResultUtils.ok(result.data);
    }

    countByPage(pageId: string): Promise<Result<number>> {
        return this.widgetRepository.countByPage(pageId);
    }

    maxPositionByPage(pageId: string): Promise<Result<number>> {
        return this.widgetRepository.maxPositionByPage(pageId);
    }
}

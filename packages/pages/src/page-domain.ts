import { ResultUtils, ValidationError, type Result } from "@miniapp/core";
import type { CreatePageInput, Page, UpdatePageInput } from "./types.ts";

export type PageDraft = {
    name: string;
    route: string;
    isHome: boolean;
};

export type PageChanges = Partial<PageDraft>;

const trimmed = (value: string): string | null => {
    const result = value.trim();
    return result.length > 0 ? result : null;
};

export const PageDomainRules = {
    validateCreateInput(input: CreatePageInput): Result<PageDraft> {
        const name = trimmed(input.name);
        if (name === null) {
            return ResultUtils.err(
                new ValidationError("Page name is required and cannot be empty", "name"),
            );
        }
        const route = trimmed(input.route);
        if (route === null) {
            return ResultUtils.err(
                new ValidationError("Page route is required and cannot be empty", "route"),
            );
        }
        return ResultUtils.ok({ name, route, isHome: input.isHome ?? false });
    },

    /**
     * Normalizes the supplied fields of an update; absent fields stay absent.
     */
    validateUpdateInput(input: UpdatePageInput): Result<PageChanges> {
        const changes: PageChanges = {};
        if (input.name !== undefined) {
            const name = trimmed(input.name);
            if (name === null) {
                return ResultUtils.err(new ValidationError("Page name cannot be empty", "name"));
            }
            changes.name = name;
        }
        if (input.route !== undefined) {
            const route = trimmed(input.route);
            if (route === null) {
                return ResultUtils.err(new ValidationError("Page route cannot be empty", "route"));
            }
            changes.route = route;
        }
        if (input.isHome !== undefined) {
            changes.isHome = input.isHome;
        }
        return ResultUtils.ok(changes);
    },

    hasChanges(changes: PageChanges): boolean {
        return (
            changes.name !== undefined
            || changes.route !== undefined
            || changes.isHome !== undefined
        );
    },

    canDelete(page: Page): boolean {
        return !page.isHome;
    },
};

export const PageFactory = {
    create(id: string, draft: PageDraft, timestamp: string): Page {
        return {
            id,
            name: draft.name,
            route: draft.route,
            isHome: draft.isHome,
            createdAt: timestamp,
            updatedAt: timestamp,
        };
    },

    update(page: Page, changes: PageChanges, timestamp: string): Page {
        return {
            ...page,
            name: changes.name ?? page.name,
            route: changes.route ?? page.route,
            isHome: changes.isHome ?? page.isHome,
            updatedAt: timestamp,
        };
    },
};

export const comparePagesNewestFirst = (left: Page, right: Page): number => {
    if (left.createdAt !== right.createdAt) {
        return left.createdAt < right.createdAt ? 1 : -1;
    }
    if (left.id === right.id) return 0;
    return left.id < right.id ? -1 : 1;
};

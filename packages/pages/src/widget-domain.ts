import { ResultUtils, ValidationError, type Result } from "@miniapp/core";
import {
    JsonValueSchema,
    WIDGET_TYPES,
    WidgetTypeSchema,
    type JsonValue,
    type Widget,
    type WidgetType,
} from "./types.ts";

/**
 * Widget configuration supplied as unparsed JSON text.
 */
export class RawJson {
    constructor(readonly text: string) {}

    isEmpty(): boolean {
        return this.text.trim().length === 0;
    }
}

export type WidgetConfigInput = JsonValue | RawJson;

export type CreateWidgetInput = {
    pageId: string;
    type: string;
    position?: number;
    config?: WidgetConfigInput;
};

export type UpdateWidgetInput = {
    type?: string;
    position?: number;
    config?: WidgetConfigInput;
};

export type WidgetDraft = {
    pageId: string;
    type: WidgetType;
    // 0 asks the store for the next free slot on the page.
    position: number;
    config: JsonValue;
};

export type WidgetChanges = {
    type?: WidgetType;
    position?: number;
    config?: JsonValue;
};

export const INVALID_WIDGET_TYPE_MESSAGE = `Invalid widget type. Must be one of: ${WIDGET_TYPES.join(", ")}`;
export const INVALID_WIDGET_CONFIG_MESSAGE = "Invalid JSON format for widget config";

const invalidConfig = (): Result<never> =>
    ResultUtils.err(new ValidationError(INVALID_WIDGET_CONFIG_MESSAGE, "config"));

const parseRawJson = (raw: RawJson): Result<JsonValue> => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw.text);
    } catch {
        return invalidConfig();
    }
    const value = JsonValueSchema.safeParse(parsed);
    return value.success ? ResultUtils.ok(value.data) : invalidConfig();
};

export const WidgetDomainRules = {
    validateType(type: string): Result<WidgetType> {
        const parsed = WidgetTypeSchema.safeParse(type);
        if (!parsed.success) {
            return ResultUtils.err(new ValidationError(INVALID_WIDGET_TYPE_MESSAGE, "type"));
        }
        return ResultUtils.ok(parsed.data);
    },

    validateTypeFilter(type: string): Result<WidgetType> {
        const parsed = WidgetTypeSchema.safeParse(type);
        if (!parsed.success) {
            return ResultUtils.err(new ValidationError("Invalid widget type filter", "type"));
        }
        return ResultUtils.ok(parsed.data);
    },

    /**
     * Accepts parsed JSON values as they are and parses raw text.
     */
    parseConfig(config: WidgetConfigInput): Result<JsonValue> {
        if (config instanceof RawJson) {
            return parseRawJson(config);
        }
        const value = JsonValueSchema.safeParse(config);
        return value.success ? ResultUtils.ok(value.data) : invalidConfig();
    },

    validateCreateInput(input: CreateWidgetInput): Result<WidgetDraft> {
        const type = WidgetDomainRules.validateType(input.type);
        if (!type.success) return type;

        let config: JsonValue = {};
        if (input.config !== undefined && !(input.config instanceof RawJson && input.config.isEmpty())) {
            const parsed = WidgetDomainRules.parseConfig(input.config);
            if (!parsed.success) return parsed;
            config = parsed.data;
        }

        const position = input.position ?? 0;
        if (!Number.isInteger(position) || position < 0) {
            return ResultUtils.err(
                new ValidationError("Widget position must be a non-negative integer", "position"),
            );
        }

        return ResultUtils.ok({ pageId: input.pageId, type: type.data, position, config });
    },

    validateUpdateInput(input: UpdateWidgetInput): Result<WidgetChanges> {
        const changes: WidgetChanges = {};
        if (input.type !== undefined) {
            const type = WidgetDomainRules.validateType(input.type);
            if (!type.success) return type;
            changes.type = type.data;
        }
        if (input.position !== undefined) {
            if (!Number.isInteger(input.position) || input.position < 1) {
                return ResultUtils.err(
                    new ValidationError("Widget position must be a positive integer", "position"),
                );
            }
            changes.position = input.position;
        }
        if (input.config !== undefined) {
            const config = WidgetDomainRules.parseConfig(input.config);
            if (!config.success) return config;
            changes.config = config.data;
        }
        return ResultUtils.ok(changes);
    },

    hasChanges(changes: WidgetChanges): boolean {
        return (
            changes.type !== undefined
            || changes.position !== undefined
            || changes.config !== undefined
        );
    },

    validateReorder(widgetIds: readonly string[]): Result<void> {
        if (widgetIds.length === 0) {
            return ResultUtils.err(new ValidationError("Widget IDs array cannot be empty", "widgetIds"));
        }
        const seen = new Set<string>();
        for (const widgetId of widgetIds) {
            if (seen.has(widgetId)) {
                return ResultUtils.err(new ValidationError("Duplicate widget ID in the list", "widgetIds"));
            }
            seen.add(widgetId);
        }
        return ResultUtils.ok(undefined);
    },
};

export const WidgetFactory = {
    create(id: string, draft: WidgetDraft, position: number, timestamp: string): Widget {
        return {
            id,
            pageId: draft.pageId,
            type: draft.type,
            position,
            config: draft.config,
            createdAt: timestamp,
            updatedAt: timestamp,
        };
    },

    update(widget: Widget, changes: WidgetChanges, timestamp: string): Widget {
        return {
            ...widget,
            type: changes.type ?? widget.type,
            position: changes.position ?? widget.position,
            config: changes.config === undefined ? widget.config : changes.config,
            updatedAt: timestamp,
        };
    },
};

export const compareWidgetsByPosition = (left: Widget, right: Widget): number => {
    if (left.position !== right.position) {
        return left.position - right.position;
    }
    if (left.createdAt !== right.createdAt) {
        return left.createdAt < right.createdAt ? -1 : 1;
    }
    if (left.id === right.id) return 0;
    return left.id < right.id ? -1 : 1;
};

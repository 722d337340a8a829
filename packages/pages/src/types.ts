import { z } from "zod";

export const WIDGET_TYPES = ["banner", "product_grid", "text", "image", "spacer"] as const;

export const WidgetTypeSchema = z.enum(WIDGET_TYPES);
export type WidgetType = z.output<typeof WidgetTypeSchema>;

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number().finite(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ]),
);

export const PageSchema = z.object({
    id: z.string(),
    name: z.string(),
    route: z.string(),
    isHome: z.boolean(),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
});
export type Page = z.output<typeof PageSchema>;

export const WidgetSchema = z.object({
    id: z.string(),
    pageId: z.string(),
    type: WidgetTypeSchema,
    position: z.number().int(),
    config: JsonValueSchema,
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
});
export type Widget = z.output<typeof WidgetSchema>;

export type PageWithWidgets = Page & { widgets: Widget[] };

export const CreatePageInputSchema = z.object({
    name: z.string(),
    route: z.string(),
    isHome: z.boolean().optional(),
});
export type CreatePageInput = z.output<typeof CreatePageInputSchema>;

// Absent keys are left untouched by an update.
export const UpdatePageInputSchema = z.object({
    name: z.string().optional(),
    route: z.string().optional(),
    isHome: z.boolean().optional(),
});
export type UpdatePageInput = z.output<typeof UpdatePageInputSchema>;

// `type` stays a plain string so the widget rules report unknown types themselves.
export const CreateWidgetBodySchema = z.object({
    type: z.string(),
    position: z.number().int().optional(),
    config: JsonValueSchema.optional(),
});

export const UpdateWidgetBodySchema = z.object({
    type: z.string().optional(),
    position: z.number().int().optional(),
    config: JsonValueSchema.optional(),
});

export const ReorderWidgetsBodySchema = z.object({
    widgetIds: z.array(z.string().uuid()),
});

export type PageListOptions = {
    page: number;
    perPage: number;
};

export type PageList = {
    pages: Page[];
    total: number;
    page: number;
    perPage: number;
    totalPages: number;
};

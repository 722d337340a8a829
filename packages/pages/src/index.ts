export * from "./types.ts";
export * from "./page-domain.ts";
export * from "./widget-domain.ts";
export type * from "./page-repository.ts";
export type * from "./widget-repository.ts";
export * from "./page-directory.ts";
export * from "./widget-sequencer.ts";
export * from "./persistence/pages-store.ts";
export * from "./persistence/storage-keys.ts";
export * from "./persistence/key-value-page-repository.ts";
export * from "./persistence/key-value-widget-repository.ts";
export * from "./pages-module.ts";

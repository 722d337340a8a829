export * from "./level-adapter.ts";

// packages/audience-routing/src/index.ts
export * from "./config";
export * from "./errors";
export * from "./resolver";
export * from "./routeTable";

// packages/token-exchange/src/index.ts
export * from "./errors";
export * from "./client";
export * from "./cache";
export * from "./exchanger";

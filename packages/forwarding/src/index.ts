// packages/forwarding/src/index.ts
export * from "./errors";
export * from "./headers";
export * from "./outbound";
export * from "./forwarder";
export * from "./relay";

export * from "./operation.js";
export * from "./events.js";
export * from "./diagnostics.js";
export * from "./protocol.js";
export * from "./idempotency.js";

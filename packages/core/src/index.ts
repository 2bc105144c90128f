export * from "./errors.js";
export * from "./config.js";
export * from "./desk.js";
export * from "./logger.js";
export * from "./persisted-config.js";

export * from "./homework/types.js";
export * from "./homework/dates.js";
export * from "./homework/lru-cache.js";
export * from "./homework/status-classifier.js";
export * from "./homework/status-cache.js";
export * from "./homework/ordering.js";
export * from "./homework/aggregates.js";
export * from "./homework/desk-state.js";

export * from "./pipeline/channel.js";
export * from "./pipeline/document.js";
export * from "./pipeline/document-store.js";
export * from "./pipeline/load-pipeline.js";

export * from "./queue/tasks.js";
export * from "./queue/coordinator.js";
export * from "./queue/handlers.js";
export * from "./queue/status-refresh-timer.js";

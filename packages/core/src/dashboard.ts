// Browser-safe entry point: everything except the config file helpers.
export * from "./client.js";
export * from "./controller.js";
export * from "./defaults.js";
export * from "./duration.js";
export * from "./errors.js";
export * from "./expansionStore.js";
export * from "./logger.js";
export * from "./scheduler.js";
export * from "./timeline.js";
export * from "./utils.js";
export * from "./view.js";

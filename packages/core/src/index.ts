export * from "./dashboard.js";
export * from "./config.js";

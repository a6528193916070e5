export * from "./app.js";
export * from "./demo.js";
export * from "./store.js";

import type { AppConfig } from "@callboard/contracts";

export const DEFAULT_ACTIVE_INTERVAL_MS = 2_000;
export const DEFAULT_IDLE_INTERVAL_MS = 15_000;

export const DEFAULT_CONFIG: AppConfig = {
  dashboard: {
    baseUrl: "http://127.0.0.1:8787",
    apiKey: "",
    activeIntervalMs: DEFAULT_ACTIVE_INTERVAL_MS,
    idleIntervalMs: DEFAULT_IDLE_INTERVAL_MS,
  },
  server: {
    host: "127.0.0.1",
    port: 8787,
    apiKey: "",
    logLevel: "info",
  },
};

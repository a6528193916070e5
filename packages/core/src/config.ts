import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, DashboardConfig, ServerConfig, ServerLogLevel } from "@callboard/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { asRecord, toFiniteNumber } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".callboard", "config.toml");

const MIN_INTERVAL_MS = 250;
const LOG_LEVELS: ServerLogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

type ConfigSection<T> = Partial<T> | Record<string, unknown>;

export interface PartialAppConfigInput {
  dashboard?: ConfigSection<DashboardConfig>;
  server?: ConfigSection<ServerConfig>;
}

function positiveMsOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(MIN_INTERVAL_MS, Math.round(numeric));
}

function portOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || !Number.isInteger(numeric) || numeric < 1 || numeric > 65_535) return fallback;
  return numeric;
}

function trimmedOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

// TOML and `config set` turn all-digit keys into numbers; keep them as text.
function stringOrDefault(value: unknown, fallback: string): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return fallback;
}

function isLogLevel(value: unknown): value is ServerLogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function mergeDashboard(input?: ConfigSection<DashboardConfig>): DashboardConfig {
  const defaults = DEFAULT_CONFIG.dashboard;
  const activeIntervalMs = positiveMsOrDefault(input?.activeIntervalMs, defaults.activeIntervalMs);
  return {
    baseUrl: trimmedOrDefault(input?.baseUrl, defaults.baseUrl).replace(/\/+$/g, ""),
    apiKey: stringOrDefault(input?.apiKey, defaults.apiKey),
    activeIntervalMs,
    idleIntervalMs: Math.max(activeIntervalMs, positiveMsOrDefault(input?.idleIntervalMs, defaults.idleIntervalMs)),
  };
}

function mergeServer(input?: ConfigSection<ServerConfig>): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const logLevel = input?.logLevel;
  return {
    host: trimmedOrDefault(input?.host, defaults.host),
    port: portOrDefault(input?.port, defaults.port),
    apiKey: stringOrDefault(input?.apiKey, defaults.apiKey),
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel,
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    dashboard: mergeDashboard(input?.dashboard),
    server: mergeServer(input?.server),
  };
}

/**
 * Environment variables win over the file: `CALLBOARD_HOST`, `CALLBOARD_PORT`
 * and `CALLBOARD_API_KEY` (which sets both the served and the polled key).
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.CALLBOARD_API_KEY;
  const envPort = env.CALLBOARD_PORT?.trim() ? Number(env.CALLBOARD_PORT) : Number.NaN;
  const port = portOrDefault(envPort, 0) || undefined;
  return mergeConfig({
    dashboard: {
      ...config.dashboard,
      ...(apiKey !== undefined ? { apiKey } : {}),
    },
    server: {
      ...config.server,
      ...(env.CALLBOARD_HOST?.trim() ? { host: env.CALLBOARD_HOST } : {}),
      ...(port !== undefined ? { port } : {}),
      ...(apiKey !== undefined ? { apiKey } : {}),
    },
  });
}

export function resolveConfigPath(configPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = configPath?.trim() || env.CALLBOARD_CONFIG?.trim() || DEFAULT_CONFIG_PATH;
  return expandHome(candidate);
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    const parsed = TOML.parse(raw);
    return mergeConfig({
      dashboard: asRecord(parsed.dashboard),
      server: asRecord(parsed.server),
    });
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}

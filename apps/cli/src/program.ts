import { emitKeypressEvents } from "node:readline";
import { Command } from "commander";
import type { AppConfig, ConversationsResponse } from "@callboard/contracts";
import {
  applyEnvOverrides,
  asRecord,
  compactText,
  consoleLogger,
  ConversationsClient,
  DashboardController,
  isPlainObject,
  loadConfig,
  mergeConfig,
  resolveConfigPath,
  saveConfig,
  type FetchLike,
  type Logger,
} from "@callboard/core";
import type { RunServerOptions } from "@callboard/server";
import { isServerHealthy, openBrowser, parsePort, toBaseUrl, viewerUrl } from "./browser.js";
import { TerminalRenderer } from "./terminalRenderer.js";

export interface CliDeps {
  log(line: string): void;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  openUrl?(url: string): Promise<void>;
  runServer?(options: RunServerOptions): Promise<void>;
}

interface ClientFlags {
  url?: string;
  key?: string;
}

export function printTable(rows: string[][], log: (line: string) => void): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ");
    log(line.trimEnd());
    if (idx === 0) {
      log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

export function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

export function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    const existing = cursor[key];
    const next: Record<string, unknown> = isPlainObject(existing) ? existing : {};
    cursor[key] = next;
    cursor = next;
  }
  cursor[lastKey] = value;
}

export function getPath(source: unknown, dottedKey: string): unknown {
  let cursor = source;
  for (const key of dottedKey.split(".").filter(Boolean)) {
    if (!isPlainObject(cursor) || !(key in cursor)) return undefined;
    cursor = cursor[key];
  }
  return cursor;
}

export function conversationRows(response: ConversationsResponse): string[][] {
  const rows = [["id", "session", "state", "utterances", "summaries", "last utterance"]];
  for (const conversation of response.conversations) {
    const last = conversation.transcript[conversation.transcript.length - 1];
    rows.push([
      conversation.id,
      conversation.session_id || "-",
      conversation.active ? "live" : "ended",
      String(conversation.transcript.length),
      String(conversation.summary.length),
      last ? compactText(last.text, 60) : "-",
    ]);
  }
  return rows;
}

function toConfigRecord(config: AppConfig): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(config));
  return asRecord(copy);
}

export function createProgram(deps: CliDeps): Command {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? consoleLogger;
  const program = new Command();

  const configPath = (): string => resolveConfigPath(program.opts<{ config?: string }>().config, env);
  const readConfig = async (): Promise<AppConfig> => applyEnvOverrides(await loadConfig(configPath()), env);
  const clientFor = (config: AppConfig, flags: ClientFlags): ConversationsClient => {
    const options = {
      baseUrl: flags.url ?? config.dashboard.baseUrl,
      apiKey: flags.key ?? config.dashboard.apiKey,
    };
    return new ConversationsClient(deps.fetch ? { ...options, fetch: deps.fetch } : options);
  };

  program.name("callboard").description("Live dashboard for call transcripts and summaries");
  program.option("--config <path>", "Config path (defaults to $CALLBOARD_CONFIG or ~/.callboard/config.toml)");
  program.addHelpText(
    "after",
    `
Examples:
  $ callboard serve --demo apps/server/demo/conversation.json
  $ callboard list --active
  $ callboard watch
  $ callboard open
  $ callboard config set dashboard.activeIntervalMs 1000
`,
  );

  program
    .command("serve")
    .description("Run the conversations API and the viewer page")
    .option("--host <host>", "Server host")
    .option("--port <port>", "Server port")
    .option("--demo <file>", "Replay a scripted conversation into the store")
    .option("--demo-step-ms <ms>", "Delay between replayed items")
    .action(async (opts: { host?: string; port?: string; demo?: string; demoStepMs?: string }) => {
      const options: RunServerOptions = {};
      const config = program.opts<{ config?: string }>().config;
      if (config) options.configPath = config;
      if (opts.host) options.host = opts.host;
      if (opts.port) options.port = parsePort(opts.port);
      if (opts.demo) options.demoPath = opts.demo;
      if (opts.demoStepMs) options.demoStepMs = Number(opts.demoStepMs);
      const run = deps.runServer ?? (await import("@callboard/server")).runServer;
      await run(options);
    });

  program
    .command("list")
    .description("Fetch the conversations once")
    .option("--active", "Only conversations still in progress")
    .option("--url <url>", "Dashboard base URL")
    .option("--key <key>", "API key")
    .option("--json", "JSON output")
    .action(async (opts: ClientFlags & { active?: boolean; json?: boolean }) => {
      const client = clientFor(await readConfig(), opts);
      const response = await client.fetchConversations(opts.active ? { active: true } : {});
      if (opts.json) {
        deps.log(JSON.stringify(response, null, 2));
        return;
      }
      if (response.conversations.length === 0) {
        deps.log("no conversations");
        return;
      }
      printTable(conversationRows(response), deps.log);
    });

  program
    .command("watch")
    .description("Live dashboard in the terminal")
    .option("--url <url>", "Dashboard base URL")
    .option("--key <key>", "API key")
    .action(async (opts: ClientFlags) => {
      const config = await readConfig();
      const renderer = new TerminalRenderer(process.stdout);
      const controller = new DashboardController({
        source: clientFor(config, opts),
        renderer,
        intervals: config.dashboard,
        logger,
      });

      await new Promise<void>((resolve) => {
        const stdin = process.stdin;
        const onKeypress = (input: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
          if (key?.ctrl && key.name === "c") {
            stop();
            return;
          }
          renderer.handleKey(input);
        };
        const stop = () => {
          controller.stop();
          process.off("SIGINT", stop);
          if (stdin.isTTY) {
            stdin.off("keypress", onKeypress);
            stdin.setRawMode(false);
            stdin.pause();
          }
          resolve();
        };

        process.once("SIGINT", stop);
        if (stdin.isTTY) {
          emitKeypressEvents(stdin);
          stdin.setRawMode(true);
          stdin.on("keypress", onKeypress);
        }
        void controller.start();
      });
    });

  program
    .command("open")
    .description("Open the viewer page of a running server in the browser")
    .option("--host <host>", "Server host")
    .option("--port <port>", "Server port")
    .action(async (opts: { host?: string; port?: string }) => {
      const config = await readConfig();
      const host = opts.host ?? config.server.host;
      const port = opts.port ? parsePort(opts.port) : config.server.port;
      const baseUrl = toBaseUrl(host, port);

      if (!(await isServerHealthy(baseUrl, deps.fetch))) {
        throw new Error(`no Callboard server answering at ${baseUrl}; start one with \`callboard serve\``);
      }
      await (deps.openUrl ?? openBrowser)(viewerUrl(baseUrl, config.server.apiKey));
      deps.log(`opened ${viewerUrl(baseUrl, "")}`);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get [key]")
    .description("Print the config, or one dotted key of it")
    .action(async (key: string | undefined) => {
      const config = await loadConfig(configPath());
      const value = key ? getPath(config, key) : config;
      if (value === undefined) {
        throw new Error(`unknown config key: ${key ?? ""}`);
      }
      deps.log(typeof value === "string" ? value : JSON.stringify(value, null, 2));
    });

  configCmd
    .command("set <key> <value>")
    .description("Set one dotted key, e.g. server.port 9000")
    .action(async (key: string, value: string) => {
      const target = configPath();
      const mutable = toConfigRecord(await loadConfig(target));
      const current = getPath(mutable, key);
      if (current === undefined || isPlainObject(current)) {
        throw new Error(`unknown config key: ${key}`);
      }
      setPath(mutable, key, parseValue(value));
      const merged = mergeConfig({ dashboard: asRecord(mutable.dashboard), server: asRecord(mutable.server) });
      await saveConfig(merged, target);
      deps.log(`updated ${key}`);
    });

  return program;
}

import { spawn } from "node:child_process";
import { asRecord, type FetchLike } from "@callboard/core";

interface OpenCommand {
  command: string;
  args: string[];
}

export function parsePort(port: string | number): number {
  const parsed = Number(port);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    throw new Error(`invalid port: ${String(port)}`);
  }
  return parsed;
}

function normalizeUrlHost(host: string): string {
  if (host.includes(":") && !host.startsWith("[") && !host.endsWith("]")) {
    return `[${host}]`;
  }
  return host;
}

export function toBaseUrl(host: string, port: number): string {
  return `http://${normalizeUrlHost(host)}:${port}`;
}

export function viewerUrl(baseUrl: string, apiKey: string): string {
  const url = `${baseUrl.replace(/\/+$/g, "")}/viewconversations`;
  return apiKey ? `${url}?${new URLSearchParams({ key: apiKey }).toString()}` : url;
}

export function buildOpenCommand(platform: NodeJS.Platform, url: string): OpenCommand {
  if (platform === "darwin") {
    return { command: "open", args: [url] };
  }
  if (platform === "win32") {
    return { command: "cmd", args: ["/c", "start", "", url] };
  }
  return { command: "xdg-open", args: [url] };
}

async function runCommand(command: string, args: string[]): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore" });
    child.once("error", reject);
    child.once("exit", (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new Error(`command failed: ${command} ${args.join(" ")} (exit ${String(code)})`));
    });
  });
}

export async function openBrowser(url: string): Promise<void> {
  const { command, args } = buildOpenCommand(process.platform, url);
  await runCommand(command, args);
}

export async function isServerHealthy(
  baseUrl: string,
  fetchImpl: FetchLike = (input, init) => fetch(input, init),
  timeoutMs = 1000,
): Promise<boolean> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(`${baseUrl.replace(/\/+$/g, "")}/`, {
      method: "GET",
      signal: controller.signal,
      headers: { accept: "application/json" },
    });
    if (!response.ok) return false;
    const data: unknown = await response.json().catch(() => ({}));
    return asRecord(data).status === "healthy";
  } catch {
    return false;
  } finally {
    clearTimeout(timeout);
  }
}

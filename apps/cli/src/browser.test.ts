import type { FetchLike } from "@callboard/core";
import { describe, expect, it, vi } from "vitest";
import { buildOpenCommand, isServerHealthy, parsePort, toBaseUrl, viewerUrl } from "./browser.js";

describe("browser helpers", () => {
  it("picks the platform opener", () => {
    expect(buildOpenCommand("darwin", "http://x")).toEqual({ command: "open", args: ["http://x"] });
    expect(buildOpenCommand("win32", "http://x")).toEqual({ command: "cmd", args: ["/c", "start", "", "http://x"] });
    expect(buildOpenCommand("linux", "http://x")).toEqual({ command: "xdg-open", args: ["http://x"] });
  });

  it("validates ports and brackets IPv6 hosts", () => {
    expect(parsePort("8787")).toBe(8787);
    expect(() => parsePort("0")).toThrow("invalid port: 0");
    expect(toBaseUrl("127.0.0.1", 8787)).toBe("http://127.0.0.1:8787");
    expect(toBaseUrl("::1", 8787)).toBe("http://[::1]:8787");
  });

  it("builds the viewer url with an escaped key", () => {
    expect(viewerUrl("http://h:1/", "a b&c")).toBe("http://h:1/viewconversations?key=a+b%26c");
    expect(viewerUrl("http://h:1", "")).toBe("http://h:1/viewconversations");
  });

  it("treats only a healthy status as a running server", async () => {
    const healthy = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ status: "healthy" }), { status: 200 }));
    expect(await isServerHealthy("http://h:1", healthy)).toBe(true);
    expect(healthy).toHaveBeenCalledWith("http://h:1/", expect.objectContaining({ method: "GET" }));

    const unhealthy: FetchLike = async () => new Response(JSON.stringify({ status: "unhealthy" }), { status: 503 });
    expect(await isServerHealthy("http://h:1", unhealthy)).toBe(false);

    const other: FetchLike = async () => new Response("<html></html>", { status: 200 });
    expect(await isServerHealthy("http://h:1", other)).toBe(false);

    const down: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    expect(await isServerHealthy("http://h:1", down)).toBe(false);
  });
});

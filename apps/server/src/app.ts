import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Fastify, { type FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import type { ApiErrorBody, ConversationsResponse, HealthCheckResponse, ServerLogLevel } from "@callboard/contracts";
import { applyEnvOverrides, asErrorMessage, asOptionalString, asRecord, loadConfig, resolveConfigPath } from "@callboard/core";
import { DEFAULT_DEMO_STEP_MS, loadDemoScript, playDemo, type DemoPlayback } from "./demo.js";
import { InMemoryConversationStore, type ConversationStore } from "./store.js";

export interface CreateServerOptions {
  store: ConversationStore;
  apiKey: string;
  logLevel?: ServerLogLevel;
  webDistPath?: string;
  enableStatic?: boolean;
}

const UNAUTHORIZED: ApiErrorBody = {
  error: { code: "unauthorized", message: "Invalid or missing API key." },
};

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function parseActiveFilter(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      return undefined;
  }
}

export function isAuthorized(apiKey: string, headerKey: string | undefined, queryKey: string | undefined): boolean {
  if (!apiKey) return false;
  return headerKey === apiKey || queryKey === apiKey;
}

export function resolveDefaultWebDistPath(packagedWebDistPath: string, monorepoWebDistPath: string): string {
  if (existsSync(monorepoWebDistPath)) {
    return monorepoWebDistPath;
  }
  if (existsSync(packagedWebDistPath)) {
    return packagedWebDistPath;
  }
  return monorepoWebDistPath;
}

function fallbackViewerPage(): string {
  return `<!doctype html>
<html><body style="font-family: sans-serif; padding: 2rem;">
<h1>Callboard server running</h1>
<p>Viewer not built yet.</p>
<p>Build once: <code>npm -w apps/web run build</code></p>
<p>API: <code>/api/conversations?key=…</code></p>
</body></html>`;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const logLevel = options.logLevel ?? "silent";
  const server = Fastify({ logger: logLevel === "silent" ? false : { level: logLevel } });
  const store = options.store;
  const packagedWebDistPath = fileURLToPath(new URL("./web", import.meta.url));
  const monorepoWebDistPath = fileURLToPath(new URL("../../web/dist", import.meta.url));
  const webDistPath = options.webDistPath ?? resolveDefaultWebDistPath(packagedWebDistPath, monorepoWebDistPath);
  const hasViewer = (options.enableStatic ?? true) && existsSync(path.join(webDistPath, "index.html"));

  if (hasViewer) {
    await server.register(fastifyStatic, {
      root: path.join(webDistPath, "assets"),
      prefix: "/assets/",
    });
  }

  server.get("/", async (_request, reply): Promise<HealthCheckResponse> => {
    try {
      await store.list();
      return { status: "healthy" };
    } catch (error) {
      server.log.error(`health check failed: conversations store unhealthy: ${asErrorMessage(error)}`);
      reply.code(503);
      return {
        status: "unhealthy",
        error: {
          code: "conversations_store",
          message: `Conversations store is unhealthy. ${asErrorMessage(error)}.`,
        },
      };
    }
  });

  // Everything registered in here needs the API key, from the header or `?key=`.
  await server.register(async (protectedRoutes) => {
    protectedRoutes.addHook("preHandler", async (request, reply) => {
      const queryKey = asOptionalString(asRecord(request.query).key);
      if (isAuthorized(options.apiKey, firstHeader(request.headers["x-api-key"]), queryKey)) return;
      request.log.warn({ route: request.routeOptions.url }, "rejected request without a valid API key");
      return reply.code(401).send(UNAUTHORIZED);
    });

    protectedRoutes.get<{ Querystring: { active?: string } }>(
      "/api/conversations",
      async (request): Promise<ConversationsResponse> => {
        const active = parseActiveFilter(request.query.active);
        const conversations = await store.list(active === undefined ? {} : { active });
        return { count: conversations.length, conversations };
      },
    );

    protectedRoutes.get<{ Params: { id: string } }>("/api/conversation/:id", async (request, reply) => {
      const conversation = await store.get(request.params.id);
      if (conversation) return conversation;
      reply.code(404);
      const body: ApiErrorBody = {
        error: {
          code: "unknown_conversation",
          message: `No conversation found for conversation ID '${request.params.id}'. Please verify the ID and try again.`,
        },
      };
      return body;
    });

    protectedRoutes.get("/viewconversations", async (_request, reply) => {
      if (!hasViewer) {
        reply.type("text/html");
        return fallbackViewerPage();
      }
      return reply.sendFile("index.html", webDistPath);
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
  enableStatic?: boolean;
  demoPath?: string;
  demoStepMs?: number;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const config = applyEnvOverrides(await loadConfig(resolveConfigPath(options.configPath)));
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;

  const store = new InMemoryConversationStore();
  const createOptions: CreateServerOptions = {
    store,
    apiKey: config.server.apiKey,
    logLevel: config.server.logLevel,
  };
  if (options.enableStatic !== undefined) {
    createOptions.enableStatic = options.enableStatic;
  }
  const server = await createServer(createOptions);

  if (!config.server.apiKey) {
    server.log.warn("no API key configured; every protected route answers 401");
  }

  let demo: DemoPlayback | null = null;
  if (options.demoPath) {
    const script = await loadDemoScript(options.demoPath);
    demo = playDemo(store, script, { stepMs: options.demoStepMs ?? DEFAULT_DEMO_STEP_MS });
    void demo.done
      .then(() => server.log.info(`demo conversation ${script.id} finished`))
      .catch((error: unknown) => server.log.error(`demo playback failed: ${asErrorMessage(error)}`));
  }

  await server.listen({ host, port });

  process.on("SIGINT", async () => {
    demo?.stop();
    await server.close();
    process.exit(0);
  });

  // eslint-disable-next-line no-console
  console.log(`Callboard server: http://${host}:${port}/viewconversations`);
}

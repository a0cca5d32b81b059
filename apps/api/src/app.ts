import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "./env.js";
import { contextMiddleware, type AppDeps } from "./middleware/context.js";
import { scrapeRoutes } from "./routes/scrape.js";
import { sseRoutes } from "./routes/sse.js";
import { filesRoutes } from "./routes/files.js";

export interface AppConfig {
  deps: AppDeps;
  corsAllowedOrigins: string[];
  /** Request logging through hono/logger. On unless disabled. */
  requestLogging?: boolean;
}

function toOrigin(value: string): string | null {
  try {
    return new URL(value).origin;
  } catch {
    return null;
  }
}

export function createApp(config: AppConfig) {
  const { deps } = config;
  const extraAllowedOrigins = config.corsAllowedOrigins
    .map(toOrigin)
    .filter((origin): origin is string => Boolean(origin));

  function isAllowedOrigin(origin?: string | null): origin is string {
    if (!origin) return false;
    if (extraAllowedOrigins.includes(origin)) return true;
    return /^http:\/\/(localhost|127\.0\.0\.1):\d+$/.test(origin);
  }

  const app = new Hono<AppEnv>();

  // Inject dependencies into context
  app.use("*", contextMiddleware(deps));

  // Logging
  if (config.requestLogging !== false) {
    app.use("*", logger());
  }

  // CORS
  app.use(
    "*",
    cors({
      origin: (origin) => (isAllowedOrigin(origin) ? origin : null),
    })
  );

  // Ensure SSE responses include CORS headers
  app.use("/api/stream", async (c, next) => {
    const origin = c.req.header("origin");
    if (isAllowedOrigin(origin)) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Vary", "Origin");
    }
    await next();
  });

  // Health check
  app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  app.route("/api", scrapeRoutes);
  app.route("/api/stream", sseRoutes);
  app.route("/files", filesRoutes);

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }
    console.error("[api] Unhandled error", error);
    return c.json({ status: "error", message: "Internal server error" }, 500);
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;

import { serve } from "@hono/node-server";
import { getStorage } from "@sitemirror/storage";
import { ScrapeController } from "@sitemirror/scraper";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const siteStorage = getStorage(config.outputDir);
const sitemapStorage = getStorage(config.sitemapOutputDir);

const controller = new ScrapeController({
  siteStorage,
  sitemapStorage,
  timeoutMs: config.requestTimeoutMs,
  delayMs: config.delayMs,
  userAgent: config.userAgent,
});

const app = createApp({
  deps: { controller, siteStorage, sitemapStorage },
  corsAllowedOrigins: config.corsAllowedOrigins,
});

console.log(`Starting control server on port ${config.port}...`);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

console.log(`Control server running at http://localhost:${config.port}`);

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${signal} received, shutting down...`);

  const active = controller.activeSession;
  if (active) {
    controller.stop(active);
    await controller.waitForIdle();
  }

  server.close((error) => {
    if (error) {
      console.error("[api] Error while closing server", error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { AlreadyRunningError, ConfigurationError, INDEX_FILE, SITEMAP_REPORT_FILE } from "@sitemirror/scraper";
import type { AppEnv } from "../env.js";

const app = new Hono<AppEnv>();

const startSchema = z.object({
  url: z.string({ required_error: "URL is required" }),
  maxPages: z.number().int().nonnegative().optional(),
  mode: z.enum(["site", "sitemap"]).optional(),
});

// Start a scrape; the run continues in the background
app.post(
  "/start",
  zValidator("json", startSchema, (result, c) => {
    if (!result.success) {
      const issue = result.error.issues[0];
      const message = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request";
      return c.json({ status: "error", message }, 400);
    }
  }),
  (c) => {
    const controller = c.get("controller");
    const { url, maxPages, mode } = c.req.valid("json");

    try {
      const handle = controller.start(url, { maxPages, mode });
      return c.json({ status: "success", sessionId: handle.id, mode: handle.mode }, 201);
    } catch (error) {
      if (error instanceof AlreadyRunningError) {
        return c.json({ status: "error", message: error.message, sessionId: error.activeSessionId }, 409);
      }
      if (error instanceof ConfigurationError) {
        return c.json({ status: "error", message: error.message }, 400);
      }
      throw error;
    }
  }
);

// Request cancellation of the active scrape
app.post("/stop", (c) => {
  const controller = c.get("controller");
  const active = controller.activeSession;
  if (!active || !controller.stop(active)) {
    return c.json({ status: "error", message: "Scraper is not running" }, 409);
  }
  return c.json({ status: "success", message: "Stop requested", sessionId: active.id });
});

app.get("/status", (c) => {
  const status = c.get("controller").status();
  if (status.running || !status.state || status.state === "failed") {
    return c.json(status);
  }

  const outputUrl =
    status.mode === "sitemap"
      ? c.get("sitemapStorage").getPublicUrl(SITEMAP_REPORT_FILE)
      : c.get("siteStorage").getPublicUrl(INDEX_FILE);
  return c.json({ ...status, outputUrl });
});

export const scrapeRoutes = app;

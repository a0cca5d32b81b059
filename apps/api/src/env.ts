import type { StorageAdapter } from "@sitemirror/storage";
import type { ScrapeController } from "@sitemirror/scraper";

/**
 * Variables set per-request via context middleware.
 * Accessed in route handlers via c.get("controller"), c.get("siteStorage"), etc.
 */
export type AppVariables = {
  controller: ScrapeController;
  siteStorage: StorageAdapter;
  sitemapStorage: StorageAdapter;
};

/**
 * Hono environment type for the control server.
 */
export type AppEnv = {
  Variables: AppVariables;
};

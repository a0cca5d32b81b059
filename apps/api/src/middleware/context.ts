import { createMiddleware } from "hono/factory";
import type { StorageAdapter } from "@sitemirror/storage";
import type { ScrapeController } from "@sitemirror/scraper";
import type { AppEnv } from "../env.js";

/**
 * Dependencies injected into the Hono app. The server entry builds them from
 * the environment; tests pass in-memory storage.
 */
export interface AppDeps {
  controller: ScrapeController;
  siteStorage: StorageAdapter;
  sitemapStorage: StorageAdapter;
}

export function contextMiddleware(deps: AppDeps) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set("controller", deps.controller);
    c.set("siteStorage", deps.siteStorage);
    c.set("sitemapStorage", deps.sitemapStorage);
    await next();
  });
}

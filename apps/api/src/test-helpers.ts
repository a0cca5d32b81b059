import { MemoryStorage } from "@sitemirror/storage";
import { ScrapeController } from "@sitemirror/scraper";
import { createApp } from "./app.js";

/** Replace `globalThis.fetch` with fixed responses; anything else is a 404. */
export function stubFetch(pages: Record<string, string>) {
  globalThis.fetch = async (input: RequestInfo | URL): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const body = pages[url];
    if (body === undefined) {
      return new Response("Not Found", { status: 404 });
    }
    return new Response(body, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
  };
}

/**
 * Like stubFetch, but every request waits until the returned release function
 * is called. Keeps a session running for as long as a test needs it.
 */
export function stubFetchBlocked(pages: Record<string, string>): () => void {
  let release = () => {};
  const gate = new Promise<void>((resolve) => {
    release = () => resolve();
  });
  stubFetch(pages);
  const respond = globalThis.fetch;
  globalThis.fetch = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    await gate;
    return respond(input, init);
  };
  return release;
}

export function createTestApp() {
  const siteStorage = new MemoryStorage();
  const sitemapStorage = new MemoryStorage();
  const controller = new ScrapeController({ siteStorage, sitemapStorage, delayMs: 0 });
  const app = createApp({
    deps: { controller, siteStorage, sitemapStorage },
    corsAllowedOrigins: ["https://dashboard.example.com"],
    requestLogging: false,
  });
  return { app, controller, siteStorage, sitemapStorage };
}

export function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

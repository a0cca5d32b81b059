import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { load } from "cheerio";
import { MemoryStorage } from "@sitemirror/storage";
import { resolveCrawlSource, runCrawl } from "./crawler.js";
import { createSession } from "./session.js";
import { html, stubFetch, text, urlset, xml, type StubRoute } from "./testing.js";
import type { CrawlOptions, CrawlProgress } from "./types.js";
import { normalizeUrl } from "./url.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const site: Record<string, StubRoute> = {
  "https://example.com/robots.txt": text("User-agent: *\nSitemap: https://example.com/sitemap.xml\n"),
  "https://example.com/sitemap.xml": xml(
    urlset("https://example.com/", "https://example.com/about", "https://example.com/missing")
  ),
  "https://example.com/": html(`<html><head><title>Home</title></head><body>
    <a href="/about">About</a>
    <a href="https://other.org/">Partner</a>
  </body></html>`),
  "https://example.com/about": html(`<html><head><title>About</title></head><body><a href="/">Home</a></body></html>`),
};

function crawl(seedUrl: string, overrides: Partial<CrawlOptions> & { maxPages?: number } = {}) {
  const { maxPages, ...options } = overrides;
  const session = createSession({ seedUrl, maxPages });
  const storage = options.storage instanceof MemoryStorage ? options.storage : new MemoryStorage();
  const logs: string[] = [];
  const run = runCrawl(session, {
    delayMs: 0,
    sleep: async () => {},
    onLog: (_level, message) => {
      logs.push(message);
    },
    ...options,
    storage,
  });
  return { session, storage, logs, run };
}

describe("resolveCrawlSource", () => {
  it("stays within sitemap URLs by default", () => {
    const source = resolveCrawlSource("https://example.com", ["https://example.com/"]);

    assert.equal(source.sitemapOnly, true);
    assert.equal(source.discoverLinks, false);
  });

  it("uses sitemap URLs when available", () => {
    const source = resolveCrawlSource(
      "https://example.com",
      ["https://example.com/", "https://example.com/pricing"],
      { sitemapOnly: true, discoverLinks: true }
    );

    assert.equal(source.usedSitemap, true);
    assert.equal(source.usedFallback, false);
    assert.deepEqual(source.seedUrls, ["https://example.com/", "https://example.com/pricing"]);
    assert.equal(source.sitemapOnly, true);
    assert.equal(source.discoverLinks, false);
  });

  it("ignores sitemap URLs on other hosts", () => {
    const source = resolveCrawlSource("https://example.com", ["https://cdn.example.net/page"]);

    assert.equal(source.usedFallback, true);
    assert.deepEqual(source.seedUrls, ["https://example.com/"]);
  });

  it("falls back to the seed page and enables link discovery when the sitemap is empty", () => {
    const source = resolveCrawlSource("https://example.com/path?utm=1#section", [], {
      sitemapOnly: true,
      discoverLinks: false,
    });

    assert.equal(source.usedSitemap, false);
    assert.equal(source.usedFallback, true);
    assert.deepEqual(source.seedUrls, ["https://example.com/path?utm=1"]);
    assert.equal(source.sitemapOnly, false);
    assert.equal(source.discoverLinks, true);
  });
});

describe("runCrawl", () => {
  it("downloads sitemap pages, records failures and writes index and report", async () => {
    const requested = stubFetch(site);
    const { session, storage, run } = crawl("https://example.com");

    const report = await run;

    assert.deepEqual(requested, [
      "https://example.com/robots.txt",
      "https://example.com/sitemap.xml",
      "https://example.com/",
      "https://example.com/about",
      "https://example.com/missing",
    ]);
    assert.equal(report.state, "completed");
    assert.equal(report.totalDownloaded, 2);
    assert.equal(report.totalFailed, 1);
    assert.deepEqual(report.failedUrls, [{ url: "https://example.com/missing", error: "HTTP 404" }]);
    assert.equal(session.state, "completed");

    assert.deepEqual(await storage.listFiles("pages"), ["pages/about.html", "pages/index.html"]);

    const index = load(storage.readText("index.html") ?? "");
    assert.deepEqual(
      index(".page-link")
        .map((_, el) => index(el).attr("href"))
        .get(),
      ["pages/about.html", "pages/index.html"]
    );
    assert.equal(index("#count-failed").text(), "1");

    const home = load(storage.readText("pages/index.html") ?? "");
    assert.equal(home('a:contains("About")').attr("href"), "about.html");
    assert.equal(home('a:contains("Partner")').attr("target"), "_blank");

    const saved = JSON.parse(storage.readText("report.json") ?? "{}");
    assert.equal(saved.totalDownloaded, 2);
    assert.equal(saved.totalFailed, 1);
  });

  it("maps every downloaded page to its local path", async () => {
    stubFetch(site);
    const { session, run } = crawl("https://example.com");

    await run;

    for (const record of session.pageRecords.filter((r) => r.status === "success")) {
      assert.equal(session.urlMap.get(normalizeUrl(record.url) ?? ""), record.localPath);
    }
  });

  it("maps redirect targets to the page saved for the requested URL", async () => {
    stubFetch({
      "https://example.com/robots.txt": text("Sitemap: https://example.com/sitemap.xml"),
      "https://example.com/sitemap.xml": xml(urlset("https://example.com/", "https://example.com/old")),
      "https://example.com/": html('<title>Home</title><a href="/about">About</a>'),
      "https://example.com/old": () => {
        const res = html("<title>About</title>");
        Object.defineProperty(res, "url", { value: "https://example.com/about" });
        return res;
      },
    });
    const { session, storage, run } = crawl("https://example.com");

    await run;

    assert.equal(session.urlMap.get("https://example.com/about"), "pages/old.html");
    const home = load(storage.readText("pages/index.html") ?? "");
    assert.equal(home('a:contains("About")').attr("href"), "old.html");
  });

  it("stops at the page cap", async () => {
    const requested = stubFetch(site);
    const { run } = crawl("https://example.com", { maxPages: 2 });

    const report = await run;

    assert.equal(report.state, "capped");
    assert.equal(report.pages.length, 2);
    assert.equal(report.totalDiscovered, 3);
    assert.equal(requested.includes("https://example.com/missing"), false);
  });

  it("fetches no pages under a zero page cap", async () => {
    const requested = stubFetch(site);
    const { storage, run } = crawl("https://example.com", { maxPages: 0 });

    const report = await run;

    assert.equal(report.state, "capped");
    assert.deepEqual(report.pages, []);
    assert.equal(report.totalDiscovered, 3);
    assert.deepEqual(requested, ["https://example.com/robots.txt", "https://example.com/sitemap.xml"]);
    assert.equal(await storage.exists("report.json"), true);
  });

  it("follows links from the seed when no sitemap exists", async () => {
    stubFetch({
      "https://example.com/": html('<title>Home</title><a href="/a">A</a>'),
      "https://example.com/a": html('<title>A</title><a href="/b">B</a>'),
      "https://example.com/b": html('<title>B</title><a href="/">Home</a>'),
    });
    const { run, logs } = crawl("https://example.com");

    const report = await run;

    assert.deepEqual(
      report.pages.map((page) => page.url),
      ["https://example.com/", "https://example.com/a", "https://example.com/b"]
    );
    assert.ok(logs.includes("No URLs found in sitemaps. Following links from https://example.com/"));
  });

  it("skips sitemap discovery when asked to", async () => {
    const requested = stubFetch(site);
    const { run } = crawl("https://example.com", { skipSitemap: true });

    await run;

    assert.equal(requested[0], "https://example.com/");
    assert.equal(requested.includes("https://example.com/robots.txt"), false);
  });

  it("does not follow in-page links out of a sitemap-seeded crawl", async () => {
    const nav = '<a href="/contact">Contact</a>';
    const requested = stubFetch({
      ...site,
      "https://example.com/": html(`<title>Home</title><a href="/about">About</a>${nav}`),
      "https://example.com/about": html(`<title>About</title>${nav}`),
      "https://example.com/contact": html("<title>Contact</title>"),
    });
    const { storage, run } = crawl("https://example.com");

    const report = await run;

    assert.equal(requested.includes("https://example.com/contact"), false);
    assert.equal(report.totalDownloaded, 2);
    assert.equal(report.totalFailed, 1);
    const index = load(storage.readText("index.html") ?? "");
    assert.equal(index(".page-link").length, 2);
    const home = load(storage.readText("pages/index.html") ?? "");
    assert.equal(home('a:contains("Contact")').attr("href"), "https://example.com/contact");
  });

  it("follows in-page links from sitemap pages when sitemapOnly is off", async () => {
    stubFetch({
      ...site,
      "https://example.com/sitemap.xml": xml(urlset("https://example.com/")),
    });
    const { run } = crawl("https://example.com", { sitemapOnly: false });

    const report = await run;

    assert.deepEqual(
      report.pages.map((page) => page.url),
      ["https://example.com/", "https://example.com/about"]
    );
  });

  it("records transport errors and non-HTML responses as failed pages", async () => {
    stubFetch({
      "https://example.com/robots.txt": text("Sitemap: https://example.com/sitemap.xml"),
      "https://example.com/sitemap.xml": xml(
        urlset("https://example.com/", "https://example.com/feed", "https://example.com/down")
      ),
      "https://example.com/": html("<title>Home</title>"),
      "https://example.com/feed": new Response("{}", { status: 200, headers: { "content-type": "application/json" } }),
      "https://example.com/down": () => {
        throw new TypeError("fetch failed");
      },
    });
    const { run } = crawl("https://example.com");

    const report = await run;

    assert.equal(report.state, "completed");
    assert.deepEqual(report.failedUrls, [
      { url: "https://example.com/feed", error: "Unsupported content type: application/json" },
      { url: "https://example.com/down", error: "fetch failed" },
    ]);
  });

  it("ends cancelled when stopped between pages", async () => {
    stubFetch(site);
    const session = createSession({ seedUrl: "https://example.com" });
    const storage = new MemoryStorage();

    const report = await runCrawl(session, {
      storage,
      onLog: () => {},
      sleep: async () => session.cancel(),
    });

    assert.equal(report.state, "cancelled");
    assert.equal(report.pages.length, 1);
    assert.equal(await storage.exists("index.html"), true);
    assert.equal(await storage.exists("report.json"), true);
  });

  it("honours an external abort signal", async () => {
    stubFetch(site);
    const controller = new AbortController();
    controller.abort();
    const { run } = crawl("https://example.com", { signal: controller.signal });

    const report = await run;

    assert.equal(report.state, "cancelled");
    assert.equal(report.pages.length, 0);
  });

  it("reports progress after every page", async () => {
    stubFetch(site);
    const progress: CrawlProgress[] = [];
    const { run } = crawl("https://example.com", {
      onProgress: (update) => {
        progress.push(update);
      },
    });

    await run;

    assert.deepEqual(progress.at(-1), {
      total: 3,
      succeeded: 2,
      failed: 1,
      currentUrl: "https://example.com/missing",
    });
  });

  it("replaces output left by a previous run", async () => {
    stubFetch(site);
    const storage = new MemoryStorage();
    await storage.writeFile("pages/stale.html", "<p>old</p>");
    const { run } = crawl("https://example.com", { storage });

    await run;

    assert.equal(await storage.exists("pages/stale.html"), false);
  });
});

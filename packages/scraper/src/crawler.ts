import { setTimeout as delay } from "node:timers/promises";
import { load } from "cheerio";
import type { StorageAdapter } from "@sitemirror/storage";
import { errorMessage } from "./errors.js";
import { createFetcher, isHtmlContentType, type Fetcher, type FetchedResource } from "./fetcher.js";
import { buildIndexHtml } from "./index-builder.js";
import { extractLinks } from "./link-extractor.js";
import { rewriteLinks } from "./link-rewriter.js";
import { log, runWithLogCallback } from "./logger.js";
import { extractTitle } from "./page-metadata.js";
import { REPORT_FILE, buildReport, writeReport } from "./report-writer.js";
import type { ScrapeSession } from "./session.js";
import { discoverSitemaps } from "./sitemap-discovery.js";
import { expandSitemaps } from "./sitemap-expander.js";
import { SlugRegistry } from "./slug.js";
import type { CrawlOptions, PageRecord, Report } from "./types.js";
import { cleanUrl, isSameHost, normalizeUrl, originOf } from "./url.js";

export const DEFAULT_DELAY_MS = 500;
export const INDEX_FILE = "index.html";
export const PAGES_DIR = "pages";

export interface CrawlSourceOptions {
  sitemapOnly?: boolean;
  discoverLinks?: boolean;
}

export interface CrawlSource {
  usedSitemap: boolean;
  usedFallback: boolean;
  seedUrls: string[];
  sitemapOnly: boolean;
  discoverLinks: boolean;
}

/**
 * Decide where the crawl starts. Sitemap pages on the seed's host win when
 * there are any, and by default the crawl stays within them; otherwise the
 * seed page itself is the only seed and link discovery is forced on so the
 * crawl can spread from it.
 */
export function resolveCrawlSource(
  seedUrl: string,
  sitemapUrls: string[],
  options: CrawlSourceOptions = {}
): CrawlSource {
  const sameHost = sitemapUrls.filter((url) => isSameHost(url, seedUrl));
  if (sameHost.length > 0) {
    const sitemapOnly = options.sitemapOnly !== false;
    return {
      usedSitemap: true,
      usedFallback: false,
      seedUrls: sameHost,
      sitemapOnly,
      discoverLinks: sitemapOnly ? false : (options.discoverLinks ?? true),
    };
  }

  return {
    usedSitemap: false,
    usedFallback: true,
    seedUrls: [cleanUrl(seedUrl) ?? seedUrl],
    sitemapOnly: false,
    discoverLinks: true,
  };
}

interface PageContext {
  session: ScrapeSession;
  fetcher: Fetcher;
  storage: StorageAdapter;
  slugs: SlugRegistry;
  discoverLinks: boolean;
  /** Page URL → URL it was finally served from, used as the base for link resolution. */
  pageBases: Map<string, string>;
}

/**
 * Run a session to completion: seed the queue, fetch pages one at a time with
 * a politeness delay between requests, then rewrite links across everything
 * that was saved and write the index and report.
 *
 * Cancellation is checked at the top of every iteration; a fetch in flight is
 * never interrupted. The page cap is checked before dequeuing.
 */
export async function runCrawl(session: ScrapeSession, options: CrawlOptions): Promise<Report> {
  return runWithLogCallback(options.onLog ?? null, async () => {
    const { storage } = options;
    const fetcher = createFetcher({ timeoutMs: options.timeoutMs, userAgent: options.userAgent });
    const sleep = options.sleep ?? ((ms: number) => delay(ms));
    const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;

    const onExternalAbort = () => session.cancel();
    if (options.signal?.aborted) {
      session.cancel();
    }
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });

    session.begin();
    try {
      log.info(`Starting website scrape: ${session.seedUrl}`);
      await clearPreviousOutput(storage);

      const source = await seedQueue(session, fetcher, options);
      const context: PageContext = {
        session,
        fetcher,
        storage,
        slugs: new SlugRegistry(PAGES_DIR, ".html"),
        discoverLinks: source.discoverLinks,
        pageBases: new Map(),
      };

      log.info(`Downloading up to ${session.maxPages ?? "all"} page(s), ${session.queue.length} queued...`);

      let processed = 0;
      let stopped = false;
      while (session.queue.length > 0) {
        if (session.cancelled) {
          log.warn("Stop signal received");
          stopped = true;
          break;
        }
        if (session.capReached()) {
          log.warn(`Limited to ${session.maxPages} pages`);
          break;
        }

        const url = session.queue.shift();
        if (url === undefined) break;
        const key = normalizeUrl(url) ?? url;
        if (session.visited.has(key)) continue;
        session.visited.add(key);

        processed++;
        log.info(`[${processed}/${session.totalScheduled}] Downloading: ${url}`, url);
        const record = session.record(await processPage(url, context));
        if (record.status === "success") {
          log.info(`Saved: ${record.localPath}`, url);
        } else {
          log.error(`Failed ${url}: ${record.error}`, url);
        }

        await options.onProgress?.({
          total: session.totalScheduled,
          succeeded: session.pagesDownloaded,
          failed: session.pagesFailed,
          currentUrl: url,
        });

        if (session.queue.length > 0 && !session.cancelled && !session.capReached()) {
          await sleep(delayMs);
        }
      }

      await rewriteStoredPages(context);
      await storage.writeFile(INDEX_FILE, buildIndexHtml(session.pageRecords, { siteUrl: session.seedUrl }));
      log.info(`Index page created: ${INDEX_FILE}`);

      session.finish(stopped ? "cancelled" : session.wasCapped ? "capped" : "completed");
      const report = buildReport(session);
      await writeReport(storage, report);
      log.info(
        `Scraping ${session.state}: ${report.totalDownloaded} downloaded, ${report.totalFailed} failed, ${report.totalDiscovered} discovered`
      );
      return report;
    } catch (error) {
      session.finish("failed", errorMessage(error));
      throw error;
    } finally {
      options.signal?.removeEventListener("abort", onExternalAbort);
    }
  });
}

async function seedQueue(session: ScrapeSession, fetcher: Fetcher, options: CrawlOptions) {
  let sitemapPages: string[] = [];

  if (!options.skipSitemap) {
    log.info("Discovering sitemaps and extracting URLs...");
    const candidates = await discoverSitemaps(originOf(session.seedUrl), { fetcher, signal: session.signal });
    if (candidates.length > 0) {
      const expansion = await expandSitemaps(candidates, { fetcher, signal: session.signal });
      sitemapPages = expansion.pages.map((page) => page.url);
      log.info(`Found ${sitemapPages.length} URLs in ${expansion.nodes.length} sitemap(s)`);
    }
  }

  const source = resolveCrawlSource(session.seedUrl, sitemapPages, { sitemapOnly: options.sitemapOnly });
  if (source.usedFallback) {
    log.warn(
      options.skipSitemap
        ? `Following links from ${session.seedUrl}`
        : `No URLs found in sitemaps. Following links from ${session.seedUrl}`
    );
  }

  for (const url of source.seedUrls) {
    session.enqueue(url);
  }
  return source;
}

async function processPage(url: string, context: PageContext): Promise<PageRecord> {
  const { session } = context;

  let resource: FetchedResource;
  try {
    resource = await context.fetcher(url);
  } catch (error) {
    return failedRecord(url, errorMessage(error));
  }

  if (!resource.ok) {
    return failedRecord(url, `HTTP ${resource.status}`);
  }
  if (!isHtmlContentType(resource.contentType)) {
    return failedRecord(url, `Unsupported content type: ${resource.contentType}`);
  }

  const $ = load(resource.body.toString("utf8"));
  const title = extractTitle($, url);

  if (context.discoverLinks) {
    let queued = 0;
    for (const link of extractLinks($, resource.finalUrl, session.seedUrl)) {
      if (session.enqueue(link)) queued++;
    }
    if (queued > 0) {
      log.debug(`Queued ${queued} new link(s) from ${url}`, url);
    }
  }

  const localPath = context.slugs.localPathFor(url);
  try {
    await context.storage.writeFile(localPath, resource.body);
  } catch (error) {
    return failedRecord(url, `Could not save page: ${errorMessage(error)}`);
  }

  context.pageBases.set(url, resource.finalUrl);
  if (resource.finalUrl !== url && isSameHost(resource.finalUrl, session.seedUrl)) {
    session.alias(resource.finalUrl, localPath);
  }

  return { url, localPath, title, status: "success" };
}

function failedRecord(url: string, error: string): PageRecord {
  return { url, localPath: "", title: url, status: "failed", error };
}

// Runs after the loop settles: a page crawled early may link to one saved later.
async function rewriteStoredPages(context: PageContext): Promise<void> {
  const { session, storage } = context;
  const saved = session.pageRecords.filter((record) => record.status === "success");
  if (saved.length === 0) {
    return;
  }

  log.info(`Rewriting links in ${saved.length} page(s)...`);
  for (const record of saved) {
    const html = (await storage.readFile(record.localPath)).toString("utf8");
    const pageUrl = context.pageBases.get(record.url) ?? record.url;
    await storage.writeFile(record.localPath, rewriteLinks(html, session.urlMap, pageUrl, { fromPath: record.localPath }));
  }
}

async function clearPreviousOutput(storage: StorageAdapter): Promise<void> {
  await storage.deleteDir(PAGES_DIR);
  await storage.deleteDir(INDEX_FILE);
  await storage.deleteDir(REPORT_FILE);
}

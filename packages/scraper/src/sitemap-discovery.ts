import { load } from "cheerio";
import { errorMessage } from "./errors.js";
import { createFetcher, looksLikeXml, type Fetcher } from "./fetcher.js";
import { log } from "./logger.js";
import { cleanUrl } from "./url.js";

export const COMMON_SITEMAP_PATHS = [
  "/sitemap.xml",
  "/sitemap_index.xml",
  "/sitemap-index.xml",
  "/sitemaps.xml",
  "/sitemap1.xml",
  "/sitemap_1.xml",
];

/** Pages probed for sitemap links when robots.txt and the well-known paths give nothing. */
const HTML_PROBE_PATHS = ["/", "/sitemap"];

export interface DiscoverOptions {
  fetcher?: Fetcher;
  signal?: AbortSignal;
}

/**
 * Candidate sitemap URLs for a domain, in priority order: robots.txt
 * directives, then well-known paths, then links found on HTML pages. Later
 * sources are only consulted when the earlier ones found nothing. Each probe
 * fails soft.
 */
export async function discoverSitemaps(domainRoot: string, options: DiscoverOptions = {}): Promise<string[]> {
  const fetcher = options.fetcher ?? createFetcher();
  const origin = new URL(domainRoot).origin;
  const found = new OrderedUrlSet();

  log.info(`Checking robots.txt at ${origin}/robots.txt`);
  found.addAll(await discoverSitemapsFromRobots(origin, fetcher));

  if (found.size === 0 && !options.signal?.aborted) {
    log.info("Checking common sitemap locations...");
    found.addAll(await probeCommonLocations(origin, fetcher, options.signal));
  }

  if (found.size === 0 && !options.signal?.aborted) {
    log.info("Checking HTML pages for sitemap links...");
    found.addAll(await discoverSitemapsFromHtml(origin, fetcher, options.signal));
  }

  if (found.size === 0) {
    log.warn(`No sitemaps found for ${origin}`);
  }
  return found.values();
}

export async function discoverSitemapsFromRobots(origin: string, fetcher: Fetcher): Promise<string[]> {
  const robotsUrl = new URL("/robots.txt", origin).toString();
  try {
    const res = await fetcher(robotsUrl);
    if (!res.ok) {
      log.debug(`robots.txt returned ${res.status}`, robotsUrl);
      return [];
    }

    const discovered = new OrderedUrlSet();
    for (const line of res.body.toString("utf8").split(/\r?\n/)) {
      const match = line.match(/^\s*sitemap\s*:\s*(.+)$/i);
      if (!match) {
        continue;
      }
      const resolved = cleanUrl(match[1], origin);
      if (resolved) {
        discovered.add(resolved);
        log.info(`Found sitemap in robots.txt: ${resolved}`);
      }
    }
    return discovered.values();
  } catch (error) {
    log.warn(`Error fetching robots.txt ${robotsUrl}: ${errorMessage(error)}`, robotsUrl);
    return [];
  }
}

async function probeCommonLocations(origin: string, fetcher: Fetcher, signal?: AbortSignal): Promise<string[]> {
  const found: string[] = [];
  for (const sitemapPath of COMMON_SITEMAP_PATHS) {
    if (signal?.aborted) {
      break;
    }
    const url = new URL(sitemapPath, origin).toString();
    try {
      const res = await fetcher(url);
      if (res.ok && looksLikeXml(res)) {
        found.push(url);
        log.info(`Found sitemap: ${url}`);
      }
    } catch (error) {
      log.debug(`Probe failed for ${url}: ${errorMessage(error)}`, url);
    }
  }
  return found;
}

async function discoverSitemapsFromHtml(origin: string, fetcher: Fetcher, signal?: AbortSignal): Promise<string[]> {
  const found = new OrderedUrlSet();
  for (const pagePath of HTML_PROBE_PATHS) {
    if (signal?.aborted) {
      break;
    }
    const pageUrl = new URL(pagePath, origin).toString();
    try {
      const res = await fetcher(pageUrl);
      if (!res.ok) {
        continue;
      }
      const $ = load(res.body.toString("utf8"));
      $('link[rel~="sitemap"][href]').each((_, el) => {
        const resolved = cleanUrl($(el).attr("href") ?? "", res.finalUrl);
        if (resolved) found.add(resolved);
      });
      $("a[href]").each((_, el) => {
        const resolved = cleanUrl($(el).attr("href") ?? "", res.finalUrl);
        if (resolved && new URL(resolved).pathname.toLowerCase().includes("sitemap")) {
          found.add(resolved);
        }
      });
    } catch (error) {
      log.debug(`Could not probe ${pageUrl} for sitemap links: ${errorMessage(error)}`, pageUrl);
    }
  }
  for (const url of found.values()) {
    log.info(`Found sitemap link in HTML: ${url}`);
  }
  return found.values();
}

class OrderedUrlSet {
  private urls: string[] = [];
  private seen = new Set<string>();

  get size(): number {
    return this.urls.length;
  }

  add(url: string): void {
    if (!this.seen.has(url)) {
      this.seen.add(url);
      this.urls.push(url);
    }
  }

  addAll(urls: string[]): void {
    urls.forEach((url) => this.add(url));
  }

  values(): string[] {
    return [...this.urls];
  }
}

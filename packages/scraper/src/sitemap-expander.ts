import { setTimeout as delay } from "node:timers/promises";
import { errorMessage } from "./errors.js";
import { createFetcher, type Fetcher } from "./fetcher.js";
import { log } from "./logger.js";
import { parseSitemapDocument } from "./sitemap-parser.js";
import type { FailedUrl, PageRef, SitemapNode } from "./types.js";
import { cleanUrl, normalizeUrl } from "./url.js";

export interface ExpandOptions {
  fetcher?: Fetcher;
  /** Normalized sitemap URLs already expanded this session. Mutated. */
  visited?: Set<string>;
  signal?: AbortSignal;
  /** Pause between sitemap fetches. */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Called once per successfully parsed document with its raw bytes. */
  onNode?: (node: SitemapNode, body: Buffer) => void | Promise<void>;
}

export interface ExpansionResult {
  pages: PageRef[];
  nodes: SitemapNode[];
  failures: FailedUrl[];
}

/**
 * Resolve sitemap URLs into the flat, deduplicated list of pages they
 * describe, following index → child links. Works through an explicit
 * worklist; a URL is marked visited when it is enqueued, so each document is
 * fetched at most once even when indexes reference each other.
 */
export async function expandSitemaps(roots: string[], options: ExpandOptions = {}): Promise<ExpansionResult> {
  const fetcher = options.fetcher ?? createFetcher();
  const visited = options.visited ?? new Set<string>();
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const worklist: string[] = [];
  const pages = new Map<string, PageRef>();
  const nodes: SitemapNode[] = [];
  const failures: FailedUrl[] = [];

  const enqueue = (raw: string): void => {
    const url = cleanUrl(raw);
    const key = url ? normalizeUrl(url) : null;
    if (!url || !key) {
      failures.push({ url: raw, error: "Invalid sitemap URL" });
      return;
    }
    if (visited.has(key)) {
      log.debug(`Skipping already expanded sitemap ${url}`, url);
      return;
    }
    visited.add(key);
    worklist.push(url);
  };

  roots.forEach(enqueue);

  let fetched = 0;
  while (worklist.length > 0) {
    if (options.signal?.aborted) {
      log.warn("Stop signal received, halting sitemap expansion");
      break;
    }

    const sitemapUrl = worklist.shift();
    if (sitemapUrl === undefined) break;

    if (fetched > 0 && options.delayMs) {
      await sleep(options.delayMs);
    }
    fetched++;

    log.info(`Parsing sitemap: ${sitemapUrl}`, sitemapUrl);
    const result = await readSitemap(fetcher, sitemapUrl).catch((error: unknown) => {
      const message = errorMessage(error);
      log.warn(`Failed to read sitemap ${sitemapUrl}: ${message}`, sitemapUrl);
      failures.push({ url: sitemapUrl, error: message });
      return null;
    });
    if (!result) {
      continue;
    }

    const { node, body } = result;
    nodes.push(node);
    await options.onNode?.(node, body);

    if (node.kind === "index") {
      log.info(`Found ${node.children.length} nested sitemap(s) in ${sitemapUrl}`, sitemapUrl);
      node.children.forEach(enqueue);
      continue;
    }

    let added = 0;
    for (const ref of node.children) {
      const key = normalizeUrl(ref.url);
      if (key && !pages.has(key)) {
        pages.set(key, ref);
        added++;
      }
    }
    log.info(`Found ${node.children.length} URLs in sitemap (${added} new)`, sitemapUrl);
  }

  return { pages: Array.from(pages.values()), nodes, failures };
}

async function readSitemap(fetcher: Fetcher, sitemapUrl: string): Promise<{ node: SitemapNode; body: Buffer }> {
  const res = await fetcher(sitemapUrl);
  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }
  return { node: parseSitemapDocument(sitemapUrl, res.body.toString("utf8")), body: res.body };
}

/** Page refs reachable from a single sitemap URL. */
export async function expandSitemap(
  sitemapUrl: string,
  visited: Set<string>,
  options: Omit<ExpandOptions, "visited"> = {}
): Promise<PageRef[]> {
  const { pages } = await expandSitemaps([sitemapUrl], { ...options, visited });
  return pages;
}

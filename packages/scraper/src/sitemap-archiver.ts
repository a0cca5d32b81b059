import type { StorageAdapter } from "@sitemirror/storage";
import { createFetcher } from "./fetcher.js";
import { log, runWithLogCallback } from "./logger.js";
import { discoverSitemaps } from "./sitemap-discovery.js";
import { expandSitemaps, type ExpansionResult } from "./sitemap-expander.js";
import { SlugRegistry } from "./slug.js";
import type { FetchOptions, LogLevel, SitemapReport, SitemapSummary } from "./types.js";
import { originOf } from "./url.js";

export const SITEMAPS_DIR = "sitemaps";
export const SITEMAP_REPORT_FILE = "sitemap_report.json";

export interface ArchiveSitemapsOptions extends FetchOptions {
  storage: StorageAdapter;
  signal?: AbortSignal;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onLog?: (level: LogLevel, message: string, url?: string) => void | Promise<void>;
}

/**
 * Sitemap-only mode: discover and expand a domain's sitemap graph, keeping
 * every parsed document verbatim under `sitemaps/` next to a summary report.
 * No pages are fetched.
 */
export async function archiveSitemaps(domainRoot: string, options: ArchiveSitemapsOptions): Promise<SitemapReport> {
  return runWithLogCallback(options.onLog ?? null, async () => {
    const { storage } = options;
    const fetcher = createFetcher({ timeoutMs: options.timeoutMs, userAgent: options.userAgent });
    const slugs = new SlugRegistry(SITEMAPS_DIR, ".xml");
    const origin = originOf(domainRoot);

    await storage.deleteDir(SITEMAPS_DIR);
    await storage.deleteDir(SITEMAP_REPORT_FILE);

    log.info(`Discovering sitemaps for ${origin}`);
    const candidates = await discoverSitemaps(origin, { fetcher, signal: options.signal });

    const expansion = await expandSitemaps(candidates, {
      fetcher,
      signal: options.signal,
      delayMs: options.delayMs,
      sleep: options.sleep,
      onNode: async (node, body) => {
        const localPath = slugs.localPathFor(node.url);
        await storage.writeFile(localPath, body);
        log.info(`Saved: ${localPath}`, node.url);
      },
    });

    const report = buildSitemapReport(expansion);
    await storage.writeFile(SITEMAP_REPORT_FILE, `${JSON.stringify(report, null, 2)}\n`);

    const indexes = report.sitemaps.filter((sitemap) => sitemap.kind === "index").length;
    log.info(
      `Downloaded ${report.sitemapCount} sitemap(s) (${indexes} index, ${report.sitemapCount - indexes} urlset), ${report.urls.length} URLs found`
    );
    return report;
  });
}

export function buildSitemapReport(expansion: ExpansionResult): SitemapReport {
  const sitemaps: SitemapSummary[] = expansion.nodes.map((node) => ({
    url: node.url,
    kind: node.kind,
    entryCount: node.children.length,
  }));

  return {
    sitemapCount: sitemaps.length,
    sitemaps,
    urls: expansion.pages.map((page) => page.url),
    failures: expansion.failures,
  };
}

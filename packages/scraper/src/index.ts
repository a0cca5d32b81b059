// Main exports
export { runCrawl, resolveCrawlSource, INDEX_FILE, PAGES_DIR, DEFAULT_DELAY_MS } from "./crawler.js";
export { archiveSitemaps, buildSitemapReport, SITEMAPS_DIR, SITEMAP_REPORT_FILE } from "./sitemap-archiver.js";
export { ScrapeController } from "./controller.js";
export type { ScrapeControllerOptions, SessionHandle, SessionFinishedEvent, StartOptions } from "./controller.js";
export { ScrapeSession, createSession } from "./session.js";

// Types
export type {
  CrawlOptions,
  CrawlProgress,
  FailedUrl,
  LogEntry,
  LogLevel,
  PageRecord,
  PageRef,
  PageStatus,
  Report,
  ScrapeMode,
  SessionState,
  SitemapKind,
  SitemapNode,
  SitemapReport,
  StatusSnapshot,
  UrlMap,
} from "./types.js";
export { ScrapeError, TransportError, ParseError, ConfigurationError, AlreadyRunningError } from "./errors.js";

// Utilities (for advanced usage)
export { discoverSitemaps, COMMON_SITEMAP_PATHS } from "./sitemap-discovery.js";
export { expandSitemaps, expandSitemap } from "./sitemap-expander.js";
export { parseSitemapDocument } from "./sitemap-parser.js";
export { fetchResource, createFetcher } from "./fetcher.js";
export type { Fetcher, FetchedResource } from "./fetcher.js";
export { extractLinks } from "./link-extractor.js";
export { rewriteLinks, ORIGIN_HREF_ATTRIBUTE } from "./link-rewriter.js";
export { buildIndexHtml } from "./index-builder.js";
export { buildReport, serializeReport, REPORT_FILE } from "./report-writer.js";
export { slugFromUrl, SlugRegistry } from "./slug.js";
export { normalizeUrl } from "./url.js";

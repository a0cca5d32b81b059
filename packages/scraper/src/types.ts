import type { StorageAdapter } from "@sitemirror/storage";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  url?: string;
  timestamp: number;
}

export type SitemapKind = "index" | "urlset";

export interface PageRef {
  url: string;
  lastModified?: string;
}

export type SitemapNode =
  | { url: string; kind: "index"; children: string[] }
  | { url: string; kind: "urlset"; children: PageRef[] };

export type PageStatus = "success" | "failed";

export interface PageRecord {
  readonly url: string;
  readonly localPath: string;
  readonly title: string;
  readonly status: PageStatus;
  readonly error?: string;
}

/** Normalized absolute URL → local path relative to the output root. */
export type UrlMap = Map<string, string>;

export type SessionState = "pending" | "running" | "completed" | "cancelled" | "capped" | "failed";

export type ScrapeMode = "site" | "sitemap";

export interface FailedUrl {
  url: string;
  error: string;
}

export interface Report {
  seedUrl: string;
  state: SessionState;
  totalDiscovered: number;
  totalDownloaded: number;
  totalFailed: number;
  pages: PageRecord[];
  failedUrls: FailedUrl[];
  durationMs: number;
  generatedAt: string;
}

export interface SitemapSummary {
  url: string;
  kind: SitemapKind;
  entryCount: number;
}

export interface SitemapReport {
  sitemapCount: number;
  sitemaps: SitemapSummary[];
  urls: string[];
  failures: FailedUrl[];
}

export interface CrawlProgress {
  total: number;
  succeeded: number;
  failed: number;
  currentUrl?: string;
}

export interface FetchOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export interface CrawlOptions extends FetchOptions {
  storage: StorageAdapter;
  /** Pause between successive fetches. */
  delayMs?: number;
  /**
   * Trust the sitemap as the complete URL list (the default). Set to false to
   * also follow in-page links from sitemap-seeded pages.
   */
  sitemapOnly?: boolean;
  /** Skip sitemap discovery entirely and crawl by following links from the seed. */
  skipSitemap?: boolean;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: CrawlProgress) => void | Promise<void>;
  onLog?: (level: LogLevel, message: string, url?: string) => void | Promise<void>;
}

export interface StatusSnapshot {
  running: boolean;
  sessionId?: string;
  mode?: ScrapeMode;
  state?: SessionState;
  pagesDownloaded: number;
  pagesFailed: number;
}

import { randomUUID } from "node:crypto";
import { ConfigurationError } from "./errors.js";
import type { LogEntry, PageRecord, ScrapeMode, SessionState, UrlMap } from "./types.js";
import { cleanUrl, normalizeUrl, parseHttpUrl } from "./url.js";

export interface SessionInit {
  seedUrl: string;
  maxPages?: number;
  mode?: ScrapeMode;
}

/**
 * Mutable state of one scrape: the work queue, visited set, records and the
 * cancellation flag. Owned by the run that created it; readers such as a
 * status endpoint only look at counters and the log.
 */
export class ScrapeSession {
  readonly id = randomUUID();
  readonly visited = new Set<string>();
  readonly queue: string[] = [];
  readonly pageRecords: PageRecord[] = [];
  readonly urlMap: UrlMap = new Map();
  readonly logs: LogEntry[] = [];

  state: SessionState = "pending";
  startedAt?: number;
  finishedAt?: number;
  failureReason?: string;

  /** Every same-host URL seen, scheduled or not. */
  private discovered = new Set<string>();
  /** URLs admitted to the queue; bounded by maxPages. */
  private scheduled = new Set<string>();
  private truncated = false;
  private controller = new AbortController();

  constructor(
    readonly seedUrl: string,
    readonly maxPages?: number,
    readonly mode: ScrapeMode = "site"
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get totalDiscovered(): number {
    return this.discovered.size;
  }

  get totalScheduled(): number {
    return this.scheduled.size;
  }

  /** True when the cap turned URLs away or records have reached it with work left. */
  get wasCapped(): boolean {
    return this.maxPages !== undefined && this.pageRecords.length >= this.maxPages && (this.truncated || this.queue.length > 0);
  }

  get pagesDownloaded(): number {
    return this.pageRecords.filter((record) => record.status === "success").length;
  }

  get pagesFailed(): number {
    return this.pageRecords.filter((record) => record.status === "failed").length;
  }

  get isFinished(): boolean {
    return this.state !== "pending" && this.state !== "running";
  }

  capReached(): boolean {
    return this.maxPages !== undefined && this.pageRecords.length >= this.maxPages;
  }

  cancel(): void {
    this.controller.abort();
  }

  begin(): void {
    this.state = "running";
    this.startedAt = Date.now();
  }

  finish(state: Exclude<SessionState, "pending" | "running">, reason?: string): void {
    this.state = state;
    this.finishedAt = Date.now();
    if (reason) {
      this.failureReason = reason;
    }
  }

  /**
   * Admit a URL to the queue unless it was already seen or the cap on
   * scheduled URLs is reached. Returns whether it was queued.
   */
  enqueue(rawUrl: string): boolean {
    const url = cleanUrl(rawUrl);
    const key = url ? normalizeUrl(url) : null;
    if (!url || !key || this.discovered.has(key)) {
      return false;
    }
    this.discovered.add(key);

    if (this.maxPages !== undefined && this.scheduled.size >= this.maxPages) {
      this.truncated = true;
      return false;
    }

    this.scheduled.add(key);
    this.queue.push(url);
    return true;
  }

  record(record: PageRecord): PageRecord {
    const frozen = Object.freeze({ ...record });
    this.pageRecords.push(frozen);
    if (frozen.status === "success") {
      const key = normalizeUrl(frozen.url);
      if (key && !this.urlMap.has(key)) {
        this.urlMap.set(key, frozen.localPath);
      }
    }
    return frozen;
  }

  /** Point an additional URL (e.g. a redirect target) at an already stored page. */
  alias(url: string, localPath: string): void {
    const key = normalizeUrl(url);
    if (key && !this.urlMap.has(key)) {
      this.urlMap.set(key, localPath);
    }
  }

  appendLog(entry: LogEntry): void {
    this.logs.push(entry);
  }
}

export function createSession(init: SessionInit): ScrapeSession {
  const seedUrl = validateSeedUrl(init.seedUrl);
  const maxPages = validateMaxPages(init.maxPages);
  return new ScrapeSession(seedUrl, maxPages, init.mode ?? "site");
}

function validateSeedUrl(raw: string): string {
  if (typeof raw !== "string" || !raw.trim()) {
    throw new ConfigurationError("URL is required");
  }
  const parsed = parseHttpUrl(raw);
  if (!parsed) {
    throw new ConfigurationError(`Invalid URL: ${raw.trim()}`);
  }
  parsed.hash = "";
  return parsed.toString();
}

function validateMaxPages(value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`maxPages must be a non-negative integer, got ${value}`);
  }
  return value;
}

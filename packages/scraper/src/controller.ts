import { EventEmitter } from "node:events";
import type { StorageAdapter } from "@sitemirror/storage";
import { runCrawl } from "./crawler.js";
import { AlreadyRunningError, errorMessage } from "./errors.js";
import { createSession, type ScrapeSession } from "./session.js";
import { archiveSitemaps } from "./sitemap-archiver.js";
import type { FetchOptions, LogEntry, LogLevel, ScrapeMode, SessionState, StatusSnapshot } from "./types.js";

export interface ScrapeControllerOptions extends FetchOptions {
  /** Where site mode writes index.html, pages/ and report.json. */
  siteStorage: StorageAdapter;
  /** Where sitemap mode writes sitemaps/ and sitemap_report.json. */
  sitemapStorage: StorageAdapter;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface StartOptions {
  maxPages?: number;
  mode?: ScrapeMode;
}

export interface SessionHandle {
  readonly id: string;
  readonly seedUrl: string;
  readonly mode: ScrapeMode;
}

export interface SessionFinishedEvent {
  sessionId: string;
  state: SessionState;
  pagesDownloaded: number;
  pagesFailed: number;
  error?: string;
}

interface ActiveRun {
  session: ScrapeSession;
  done: Promise<void>;
}

/**
 * Owns the one scrape allowed per process. `start` either hands back a handle
 * or throws synchronously; the run itself continues in the background and
 * reports through `subscribe`.
 */
export class ScrapeController {
  private active: ActiveRun | null = null;
  private last: ScrapeSession | null = null;
  private events = new EventEmitter();

  constructor(private options: ScrapeControllerOptions) {
    this.events.setMaxListeners(0);
  }

  start(seedUrl: string, options: StartOptions = {}): SessionHandle {
    if (this.active) {
      throw new AlreadyRunningError(this.active.session.id);
    }

    const session = createSession({ seedUrl, maxPages: options.maxPages, mode: options.mode });
    const run: ActiveRun = { session, done: Promise.resolve() };
    this.active = run;
    run.done = this.execute(session);

    return { id: session.id, seedUrl: session.seedUrl, mode: session.mode };
  }

  /** Request cancellation. Returns false when the handle is not the active session. */
  stop(handle: SessionHandle | string): boolean {
    const id = typeof handle === "string" ? handle : handle.id;
    const session = this.active?.session;
    if (!session || session.id !== id) {
      return false;
    }
    if (!session.cancelled) {
      session.cancel();
      this.publish(session, "warn", "Stopping scraper...");
    }
    return true;
  }

  get activeSession(): SessionHandle | null {
    const session = this.active?.session;
    return session ? { id: session.id, seedUrl: session.seedUrl, mode: session.mode } : null;
  }

  status(): StatusSnapshot {
    const session = this.active?.session ?? this.last;
    if (!session) {
      return { running: false, pagesDownloaded: 0, pagesFailed: 0 };
    }
    return {
      running: this.active !== null,
      sessionId: session.id,
      mode: session.mode,
      state: session.state,
      pagesDownloaded: session.pagesDownloaded,
      pagesFailed: session.pagesFailed,
    };
  }

  /** Log entries of the active session, or of the last one when idle. */
  logs(): LogEntry[] {
    const session = this.active?.session ?? this.last;
    return session ? [...session.logs] : [];
  }

  subscribe(listener: (entry: LogEntry, sessionId: string) => void): () => void {
    this.events.on("log", listener);
    return () => this.events.off("log", listener);
  }

  onFinished(listener: (event: SessionFinishedEvent) => void): () => void {
    this.events.on("finished", listener);
    return () => this.events.off("finished", listener);
  }

  /** Resolves once the active run, if any, has settled. */
  async waitForIdle(): Promise<void> {
    await this.active?.done;
  }

  private async execute(session: ScrapeSession): Promise<void> {
    const onLog = (level: LogLevel, message: string, url?: string) => this.publish(session, level, message, url);
    const { siteStorage, sitemapStorage, ...fetchAndPacing } = this.options;

    try {
      if (session.mode === "sitemap") {
        session.begin();
        await archiveSitemaps(session.seedUrl, { ...fetchAndPacing, storage: sitemapStorage, signal: session.signal, onLog });
        session.finish(session.cancelled ? "cancelled" : "completed");
      } else {
        await runCrawl(session, { ...fetchAndPacing, storage: siteStorage, onLog });
      }

      if (session.state === "cancelled") {
        this.publish(session, "warn", "Scraping stopped by user");
      } else {
        this.publish(session, "info", "Scraping completed successfully!");
      }
    } catch (error) {
      if (!session.isFinished) {
        session.finish("failed", errorMessage(error));
      }
      this.publish(session, "error", `Error: ${errorMessage(error)}`);
    } finally {
      this.last = session;
      this.active = null;
      const event: SessionFinishedEvent = {
        sessionId: session.id,
        state: session.state,
        pagesDownloaded: session.pagesDownloaded,
        pagesFailed: session.pagesFailed,
        error: session.failureReason,
      };
      this.events.emit("finished", event);
    }
  }

  private publish(session: ScrapeSession, level: LogLevel, message: string, url?: string): void {
    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (url) {
      entry.url = url;
    }
    session.appendLog(entry);
    this.events.emit("log", entry, session.id);
  }
}

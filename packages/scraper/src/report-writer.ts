import type { StorageAdapter } from "@sitemirror/storage";
import type { ScrapeSession } from "./session.js";
import type { Report } from "./types.js";

export const REPORT_FILE = "report.json";

/**
 * Snapshot of a session's outcome. Counts come from partitioning the
 * records by status; nothing is recomputed.
 */
export function buildReport(session: ScrapeSession, now: Date = new Date()): Report {
  const pages = [...session.pageRecords];
  const failed = pages.filter((record) => record.status === "failed");
  const startedAt = session.startedAt ?? now.getTime();

  return {
    seedUrl: session.seedUrl,
    state: session.state,
    totalDiscovered: session.totalDiscovered,
    totalDownloaded: pages.length - failed.length,
    totalFailed: failed.length,
    pages,
    failedUrls: failed.map((record) => ({ url: record.url, error: record.error ?? "Unknown error" })),
    durationMs: (session.finishedAt ?? now.getTime()) - startedAt,
    generatedAt: now.toISOString(),
  };
}

export function serializeReport(report: Report): string {
  const document = {
    ...report,
    pages: report.pages.map(({ url, localPath, title, status }) => ({ url, localPath, title, status })),
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

export async function writeReport(storage: StorageAdapter, report: Report): Promise<void> {
  await storage.writeFile(REPORT_FILE, serializeReport(report));
}

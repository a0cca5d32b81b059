import { TransportError, errorMessage } from "./errors.js";
import type { FetchOptions } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";

export interface FetchedResource {
  /** URL that was requested. */
  url: string;
  /** URL after redirects. */
  finalUrl: string;
  status: number;
  ok: boolean;
  contentType: string;
  body: Buffer;
}

export type Fetcher = (url: string) => Promise<FetchedResource>;

/**
 * One GET with a timeout. Non-2xx responses are returned as-is; only
 * transport failures throw, always as TransportError. No retries.
 */
export async function fetchResource(url: string, options: FetchOptions = {}): Promise<FetchedResource> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      redirect: "follow",
      headers: {
        "user-agent": options.userAgent ?? DEFAULT_USER_AGENT,
        accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      signal: controller.signal,
    });
    const body = Buffer.from(await res.arrayBuffer());

    return {
      url,
      finalUrl: res.url || url,
      status: res.status,
      ok: res.ok,
      contentType: res.headers.get("content-type") ?? "",
      body,
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TransportError(url, `Request timed out after ${timeoutMs}ms`);
    }
    throw new TransportError(url, describeTransportFailure(error));
  } finally {
    clearTimeout(timeout);
  }
}

export function createFetcher(options: FetchOptions = {}): Fetcher {
  return (url) => fetchResource(url, options);
}

export function isHtmlContentType(contentType: string): boolean {
  if (!contentType.trim()) {
    return true;
  }
  const lower = contentType.toLowerCase();
  return lower.includes("text/html") || lower.includes("application/xhtml");
}

export function looksLikeXml(resource: FetchedResource): boolean {
  const lower = resource.contentType.toLowerCase();
  if (lower.includes("/xml") || lower.includes("+xml")) {
    return true;
  }
  const head = resource.body.subarray(0, 512).toString("utf8").trimStart().toLowerCase();
  return head.startsWith("<?xml") || head.startsWith("<urlset") || head.startsWith("<sitemapindex");
}

// undici reports DNS and connection failures as "fetch failed" with the real reason on `cause`
function describeTransportFailure(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message} (${errorMessage(error.cause)})`;
  }
  return message;
}

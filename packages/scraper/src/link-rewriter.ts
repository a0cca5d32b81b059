import path from "node:path";
import { load, type CheerioAPI } from "cheerio";
import type { UrlMap } from "./types.js";
import { hostOf, normalizeUrl, parseHttpUrl } from "./url.js";

/** Holds the absolute URL an anchor pointed at before it was made local. */
export const ORIGIN_HREF_ATTRIBUTE = "data-origin-href";

const SKIPPED_SCHEME = /^(javascript|mailto|tel|data):/i;

export interface RewriteLinksOptions {
  /**
   * Local path of the document being rewritten, relative to the output root.
   * Rewritten links are made relative to its directory. Defaults to the root.
   */
  fromPath?: string;
}

/**
 * Point a page's anchors at the offline copies in `urlMap`.
 *
 * - crawled targets become paths relative to `fromPath` (fragment kept)
 * - same-host targets that were never downloaded stay on the live site, as absolute URLs
 * - other hosts stay absolute and open in a new tab
 *
 * Pure; running it again on its own output with the same map is a no-op.
 */
export function rewriteLinks(html: string, urlMap: UrlMap, pageUrl: string, options: RewriteLinksOptions = {}): string {
  const $ = load(html);
  rewriteAnchors($, urlMap, pageUrl, options.fromPath);
  return $.html();
}

function rewriteAnchors($: CheerioAPI, urlMap: UrlMap, pageUrl: string, fromPath?: string) {
  const siteHost = hostOf(pageUrl);
  const fromDir = fromPath ? path.posix.dirname(fromPath) : ".";

  $("a[href]").each((_, el) => {
    const $el = $(el);
    const original = $el.attr(ORIGIN_HREF_ATTRIBUTE) ?? $el.attr("href") ?? "";
    const href = original.trim();
    if (!href || href.startsWith("#") || SKIPPED_SCHEME.test(href)) {
      return;
    }

    const resolved = parseHttpUrl(href, pageUrl);
    if (!resolved) {
      return;
    }

    const key = normalizeUrl(resolved.toString());
    const localPath = key ? urlMap.get(key) : undefined;
    if (localPath) {
      $el.attr("href", `${path.posix.relative(fromDir, localPath)}${resolved.hash}`);
      $el.attr(ORIGIN_HREF_ATTRIBUTE, resolved.toString());
      return;
    }

    $el.attr("href", isAbsolute(href) ? href : resolved.toString());
    if (resolved.hostname.toLowerCase() !== siteHost) {
      $el.attr("target", "_blank");
      $el.attr("rel", "noopener noreferrer");
    }
  });
}

function isAbsolute(href: string): boolean {
  return parseHttpUrl(href) !== null;
}

import { load, type CheerioAPI } from "cheerio";
import { cleanUrl, isSameHost, normalizeUrl } from "./url.js";

const ASSET_EXTENSION = /\.(js|css|png|jpe?g|gif|webp|svg|avif|ico|woff2?|ttf|otf|eot|mp4|webm|mp3|wav|pdf|zip|xml|json)$/;
const SKIPPED_SCHEME = /^(javascript|mailto|tel|data|ftp):/i;

/**
 * Same-host page links found in a document's anchors, resolved against
 * `pageUrl`, fragment-free and deduplicated by normalized URL in document order.
 */
export function extractLinks(document: string | CheerioAPI, pageUrl: string, siteUrl: string): string[] {
  const $ = typeof document === "string" ? load(document) : document;
  const discovered = new Map<string, string>();

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    if (!href || href.startsWith("#") || SKIPPED_SCHEME.test(href)) {
      return;
    }

    const resolved = cleanUrl(href, pageUrl);
    if (!resolved || !isSameHost(resolved, siteUrl)) {
      return;
    }

    if (ASSET_EXTENSION.test(new URL(resolved).pathname.toLowerCase())) {
      return;
    }

    const key = normalizeUrl(resolved);
    if (key && !discovered.has(key)) {
      discovered.set(key, resolved);
    }
  });

  return Array.from(discovered.values());
}

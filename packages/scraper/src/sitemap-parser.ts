import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "./errors.js";
import type { PageRef, SitemapNode } from "./types.js";
import { cleanUrl } from "./url.js";

const parser = new XMLParser({
  ignoreAttributes: false,
  allowBooleanAttributes: true,
  parseTagValue: false,
  transformTagName: (tagName: string) => tagName.toLowerCase(),
});

/**
 * Classify and read one sitemap document. `sitemapindex` yields child sitemap
 * URLs, `urlset` yields page refs. Documents that are not XML at all are read
 * as plain-text sitemaps (one URL per line).
 */
export function parseSitemapDocument(sitemapUrl: string, text: string): SitemapNode {
  const trimmed = text.trim();
  if (!trimmed.startsWith("<")) {
    return parseTextSitemap(sitemapUrl, trimmed);
  }

  const validation = XMLValidator.validate(trimmed);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseError(sitemapUrl, `Malformed XML at line ${line}: ${msg}`);
  }

  const doc: unknown = parser.parse(trimmed);

  if (hasTag(doc, "sitemapindex")) {
    const index = getNodeByTagName(doc, "sitemapindex");
    const children: string[] = [];
    for (const child of normalizeArray(getNodeByTagName(index, "sitemap"))) {
      const loc = textOf(getNodeByTagName(child, "loc"));
      const resolved = loc ? cleanUrl(loc, sitemapUrl) : null;
      if (resolved) {
        children.push(resolved);
      }
    }
    return { url: sitemapUrl, kind: "index", children };
  }

  if (hasTag(doc, "urlset")) {
    const urlSet = getNodeByTagName(doc, "urlset");
    const children: PageRef[] = [];
    for (const entry of normalizeArray(getNodeByTagName(urlSet, "url"))) {
      const loc = textOf(getNodeByTagName(entry, "loc"));
      const resolved = loc ? cleanUrl(loc, sitemapUrl) : null;
      if (!resolved) {
        continue;
      }
      const lastModified = textOf(getNodeByTagName(entry, "lastmod"));
      children.push(lastModified ? { url: resolved, lastModified } : { url: resolved });
    }
    return { url: sitemapUrl, kind: "urlset", children };
  }

  throw new ParseError(sitemapUrl, "Document root is neither <sitemapindex> nor <urlset>");
}

function parseTextSitemap(sitemapUrl: string, text: string): SitemapNode {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));

  // Plain-text sitemaps hold absolute URLs only; anything else is some other document
  const children: PageRef[] = [];
  for (const line of lines) {
    const url = cleanUrl(line);
    if (!url) {
      throw new ParseError(sitemapUrl, "Document is neither XML nor a plain-text URL list");
    }
    children.push({ url });
  }

  if (!children.length) {
    throw new ParseError(sitemapUrl, "Document is neither XML nor a plain-text URL list");
  }
  return { url: sitemapUrl, kind: "urlset", children };
}

function hasTag(value: unknown, tagName: string): boolean {
  if (!isRecord(value)) {
    return false;
  }
  const suffix = `:${tagName}`;
  return Object.keys(value).some((key) => key === tagName || key.endsWith(suffix));
}

function getNodeByTagName(value: unknown, tagName: string): unknown {
  if (!isRecord(value)) {
    return undefined;
  }

  if (tagName in value) {
    return value[tagName];
  }

  const suffix = `:${tagName}`;
  for (const [key, node] of Object.entries(value)) {
    if (key.endsWith(suffix)) {
      return node;
    }
  }

  return undefined;
}

function textOf(value: unknown): string | null {
  if (typeof value === "string") {
    return value.trim() || null;
  }
  if (isRecord(value) && typeof value["#text"] === "string") {
    return value["#text"].trim() || null;
  }
  return null;
}

function normalizeArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

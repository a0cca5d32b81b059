import { createHash } from "node:crypto";
import { normalizeUrl, parseHttpUrl } from "./url.js";

const MAX_SLUG_LENGTH = 200;
const KNOWN_EXTENSIONS = /\.(html?|xml|txt)$/i;

/**
 * Deterministic file-system-safe name for a URL's path and query.
 * `/` → `index`, `/docs/guide/` → `docs_guide`, `/search?q=a b` → `search_q_a_b`.
 */
export function slugFromUrl(url: string): string {
  const parsed = parseHttpUrl(url);
  if (!parsed) {
    throw new TypeError(`Not an http(s) URL: ${url}`);
  }

  let slug = safeDecodeURIComponent(parsed.pathname)
    .replace(/^\/+|\/+$/g, "")
    .replace(KNOWN_EXTENSIONS, "")
    .replace(/\/+/g, "_");

  if (parsed.search.length > 1) {
    slug += `_${safeDecodeURIComponent(parsed.search.slice(1))}`;
  }

  slug = slug
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[_.-]+|[_.-]+$/g, "");

  if (!slug) {
    return "index";
  }

  if (slug.length > MAX_SLUG_LENGTH) {
    const digest = createHash("sha1").update(url).digest("hex").slice(0, 8);
    slug = `${slug.slice(0, MAX_SLUG_LENGTH - digest.length - 1)}-${digest}`;
  }

  return slug;
}

/**
 * Hands out one local path per normalized URL. Two different URLs that slug
 * to the same name (compared case-insensitively) get `-2`, `-3`, ... suffixes
 * in the order they were first seen.
 */
export class SlugRegistry {
  private assigned = new Map<string, string>();
  private taken = new Set<string>();

  constructor(
    private directory = "pages",
    private extension = ".html"
  ) {}

  localPathFor(url: string): string {
    const key = normalizeUrl(url) ?? url;
    const existing = this.assigned.get(key);
    if (existing) {
      return existing;
    }

    const base = slugFromUrl(url);
    let candidate = base;
    for (let suffix = 2; this.taken.has(candidate.toLowerCase()); suffix++) {
      candidate = `${base}-${suffix}`;
    }

    this.taken.add(candidate.toLowerCase());
    const localPath = `${this.directory}/${candidate}${this.extension}`;
    this.assigned.set(key, localPath);
    return localPath;
  }
}

function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

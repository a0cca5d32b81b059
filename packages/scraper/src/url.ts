/**
 * Canonical form used for visited-set and UrlMap keys: scheme and host
 * lowercased (default port dropped), fragment removed, trailing slashes
 * stripped from the path. The query string is kept.
 *
 * Returns null for unparseable input and for anything that is not http(s).
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  const parsed = parseHttpUrl(raw, base);
  if (!parsed) {
    return null;
  }
  const pathname = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.origin}${pathname}${parsed.search}`;
}

/** Absolute URL with the fragment removed, otherwise as written. */
export function cleanUrl(raw: string, base?: string): string | null {
  const parsed = parseHttpUrl(raw, base);
  if (!parsed) {
    return null;
  }
  parsed.hash = "";
  return parsed.toString();
}

export function parseHttpUrl(raw: string, base?: string): URL | null {
  try {
    const parsed = base === undefined ? new URL(raw.trim()) : new URL(raw.trim(), base);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return null;
    }
    return parsed;
  } catch {
    return null;
  }
}

export function hostOf(url: string): string | null {
  return parseHttpUrl(url)?.hostname.toLowerCase() ?? null;
}

export function isSameHost(url: string, siteUrl: string): boolean {
  const host = hostOf(url);
  return host !== null && host === hostOf(siteUrl);
}

/** `scheme://host[:port]` of a URL, e.g. the domain root sitemaps are discovered under. */
export function originOf(url: string): string {
  const parsed = parseHttpUrl(url);
  if (!parsed) {
    throw new TypeError(`Not an http(s) URL: ${url}`);
  }
  return parsed.origin;
}

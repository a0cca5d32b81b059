import { load, type CheerioAPI } from "cheerio";

/**
 * `<title>`, else the first `<h1>`, else the URL's path.
 */
export function extractTitle(document: string | CheerioAPI, pageUrl: string): string {
  const $ = typeof document === "string" ? load(document) : document;

  const title = collapseWhitespace($("title").first().text());
  if (title) {
    return title;
  }

  const heading = collapseWhitespace($("h1").first().text());
  if (heading) {
    return heading;
  }

  try {
    return decodeURIComponent(new URL(pageUrl).pathname) || "/";
  } catch {
    return pageUrl;
  }
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

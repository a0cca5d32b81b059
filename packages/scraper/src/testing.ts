export type StubRoute = Response | (() => Response | Promise<Response>);

/**
 * Replace `globalThis.fetch` with a lookup table. Unknown URLs get a 404.
 * Returns the list of requested URLs, in order.
 */
export function stubFetch(routes: Record<string, StubRoute>): string[] {
  const requested: string[] = [];
  globalThis.fetch = async (input: RequestInfo | URL): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    requested.push(url);
    const route = routes[url];
    if (!route) {
      return new Response("Not Found", { status: 404 });
    }
    return typeof route === "function" ? route() : route.clone();
  };
  return requested;
}

export function xml(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "application/xml" } });
}

export function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function text(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "text/plain" } });
}

export function urlset(...locs: string[]): string {
  const entries = locs.map((loc) => `<url><loc>${loc}</loc></url>`).join("\n  ");
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  ${entries}
</urlset>`;
}

export function sitemapIndex(...locs: string[]): string {
  const entries = locs.map((loc) => `<sitemap><loc>${loc}</loc></sitemap>`).join("\n  ");
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  ${entries}
</sitemapindex>`;
}

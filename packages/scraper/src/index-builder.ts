import type { PageRecord } from "./types.js";

export interface IndexPageOptions {
  siteUrl: string;
  generatedAt?: Date;
}

const STYLES = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; background: #f1f3f5; padding: 20px; color: #222; }
  .container { max-width: 1100px; margin: 0 auto; background: #fff; border-radius: 10px; box-shadow: 0 10px 30px rgba(0, 0, 0, 0.12); overflow: hidden; }
  header { background: #4c5fd5; color: #fff; padding: 32px 40px; }
  header h1 { font-size: 2em; margin-bottom: 6px; }
  .stats { display: flex; justify-content: space-around; flex-wrap: wrap; padding: 20px 40px; background: #f8f9fa; border-bottom: 1px solid #e0e0e0; }
  .stat { text-align: center; }
  .stat-number { font-size: 1.8em; font-weight: bold; color: #4c5fd5; }
  .stat-label { color: #666; font-size: 0.9em; }
  .search-box { padding: 20px 40px; border-bottom: 1px solid #e0e0e0; }
  #search-input { width: 100%; padding: 12px 16px; font-size: 16px; border: 2px solid #ddd; border-radius: 8px; }
  #search-input:focus { outline: none; border-color: #4c5fd5; }
  .pages-list { list-style: none; padding: 20px 40px; }
  .page-item { padding: 14px; margin-bottom: 10px; background: #f8f9fa; border-radius: 8px; border-left: 4px solid #4c5fd5; }
  .page-item.hidden { display: none; }
  .page-link { font-size: 1.05em; font-weight: 600; color: #333; text-decoration: none; }
  .page-link:hover { text-decoration: underline; }
  .page-url { color: #999; font-size: 0.85em; font-family: monospace; word-break: break-all; margin-top: 4px; }
  .empty { padding: 20px 40px; color: #666; }
  footer { padding: 20px 40px; text-align: center; color: #666; border-top: 1px solid #e0e0e0; }
`;

const SEARCH_SCRIPT = `
  (function () {
    var input = document.getElementById("search-input");
    var items = document.querySelectorAll(".page-item");
    input.addEventListener("input", function (event) {
      var term = event.target.value.trim().toLowerCase();
      items.forEach(function (item) {
        var title = item.getAttribute("data-title") || "";
        var url = item.getAttribute("data-url") || "";
        var match = !term || title.indexOf(term) !== -1 || url.indexOf(term) !== -1;
        item.classList.toggle("hidden", !match);
      });
    });
  })();
`;

/**
 * Successful records ordered by title (case-insensitive), ties broken by URL.
 */
export function sortForIndex(records: readonly PageRecord[]): PageRecord[] {
  return records
    .filter((record) => record.status === "success")
    .sort((a, b) => {
      const titleA = a.title.toLowerCase();
      const titleB = b.title.toLowerCase();
      if (titleA !== titleB) {
        return titleA < titleB ? -1 : 1;
      }
      if (a.url === b.url) return 0;
      return a.url < b.url ? -1 : 1;
    });
}

/**
 * Self-contained entry page: summary counts, a search box filtering by
 * title or URL substring, and one entry per downloaded page.
 */
export function buildIndexHtml(records: readonly PageRecord[], options: IndexPageOptions): string {
  const pages = sortForIndex(records);
  const failedCount = records.filter((record) => record.status === "failed").length;
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  const siteUrl = escapeHtml(options.siteUrl);

  const items = pages
    .map(
      (page) => `      <li class="page-item" data-title="${escapeHtml(page.title.toLowerCase())}" data-url="${escapeHtml(page.url.toLowerCase())}">
        <a class="page-link" href="${escapeHtml(page.localPath)}">${escapeHtml(page.title)}</a>
        <div class="page-url">${escapeHtml(page.url)}</div>
      </li>`
    )
    .join("\n");

  const list = pages.length
    ? `<ul class="pages-list" id="pages-list">\n${items}\n    </ul>`
    : `<p class="empty">No pages were downloaded.</p>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Offline Website Index - ${siteUrl}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <header>
      <h1>Offline Website</h1>
      <p>${siteUrl}</p>
    </header>
    <div class="stats">
      <div class="stat"><div class="stat-number" id="count-downloaded">${pages.length}</div><div class="stat-label">Pages Downloaded</div></div>
      <div class="stat"><div class="stat-number" id="count-failed">${failedCount}</div><div class="stat-label">Failed</div></div>
      <div class="stat"><div class="stat-number" id="count-total">${pages.length + failedCount}</div><div class="stat-label">Total Attempted</div></div>
    </div>
    <div class="search-box">
      <input type="search" id="search-input" placeholder="Search pages..." autocomplete="off">
    </div>
    ${list}
    <footer>
      <p>Generated on ${generatedAt}</p>
    </footer>
  </div>
  <script>${SEARCH_SCRIPT}</script>
</body>
</html>
`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

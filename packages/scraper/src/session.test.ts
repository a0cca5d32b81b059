import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ConfigurationError } from "./errors.js";
import { createSession } from "./session.js";

describe("createSession", () => {
  it("normalizes the seed URL", () => {
    const session = createSession({ seedUrl: "  https://example.com/start#intro " });

    assert.equal(session.seedUrl, "https://example.com/start");
    assert.equal(session.state, "pending");
    assert.equal(session.mode, "site");
  });

  it("rejects missing and non-http URLs", () => {
    assert.throws(() => createSession({ seedUrl: "   " }), { name: "ConfigurationError", message: "URL is required" });
    assert.throws(() => createSession({ seedUrl: "ftp://example.com" }), {
      name: "ConfigurationError",
      message: "Invalid URL: ftp://example.com",
    });
  });

  it("rejects a page cap that is not a non-negative integer", () => {
    for (const maxPages of [-1, 2.5, Number.NaN]) {
      assert.throws(() => createSession({ seedUrl: "https://example.com", maxPages }), ConfigurationError);
    }
  });

  it("accepts a zero page cap and schedules nothing", () => {
    const session = createSession({ seedUrl: "https://example.com", maxPages: 0 });

    assert.equal(session.maxPages, 0);
    assert.equal(session.enqueue("https://example.com/"), false);
    assert.deepEqual(session.queue, []);
    assert.equal(session.capReached(), true);
    assert.equal(session.wasCapped, true);
  });
});

describe("ScrapeSession", () => {
  it("queues each URL once and stops scheduling at the cap", () => {
    const session = createSession({ seedUrl: "https://example.com", maxPages: 2 });

    assert.equal(session.enqueue("https://example.com/a"), true);
    assert.equal(session.enqueue("https://example.com/a/"), false);
    assert.equal(session.enqueue("https://example.com/b#x"), true);
    assert.equal(session.enqueue("https://example.com/c"), false);
    assert.equal(session.enqueue("not a url"), false);

    assert.deepEqual(session.queue, ["https://example.com/a", "https://example.com/b"]);
    assert.equal(session.totalScheduled, 2);
    assert.equal(session.totalDiscovered, 3);
  });

  it("maps successful records only and freezes them", () => {
    const session = createSession({ seedUrl: "https://example.com" });

    const saved = session.record({ url: "https://example.com/a/", localPath: "pages/a.html", title: "A", status: "success" });
    session.record({ url: "https://example.com/b", localPath: "", title: "https://example.com/b", status: "failed", error: "HTTP 404" });

    assert.equal(Object.isFrozen(saved), true);
    assert.deepEqual([...session.urlMap], [["https://example.com/a", "pages/a.html"]]);
    assert.equal(session.pagesDownloaded, 1);
    assert.equal(session.pagesFailed, 1);
  });

  it("reports a cap only when work was turned away", () => {
    const session = createSession({ seedUrl: "https://example.com", maxPages: 1 });
    session.enqueue("https://example.com/a");
    session.queue.shift();
    session.record({ url: "https://example.com/a", localPath: "pages/a.html", title: "A", status: "success" });

    assert.equal(session.capReached(), true);
    assert.equal(session.wasCapped, false);

    session.enqueue("https://example.com/b");
    assert.equal(session.wasCapped, true);
  });

  it("exposes cancellation through its signal", () => {
    const session = createSession({ seedUrl: "https://example.com" });
    session.cancel();

    assert.equal(session.cancelled, true);
    assert.equal(session.signal.aborted, true);
  });
});

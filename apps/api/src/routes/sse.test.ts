import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { createTestApp, postJson, stubFetch } from "../test-helpers.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

function parseEvents(text: string) {
  return text
    .split("\n\n")
    .filter((block) => block.trim())
    .map((block) => {
      const lines = block.split("\n");
      const event = lines.find((line) => line.startsWith("event: "))?.slice("event: ".length);
      const data = lines.find((line) => line.startsWith("data: "))?.slice("data: ".length) ?? "null";
      return { event, data: JSON.parse(data) };
    });
}

describe("GET /api/stream", () => {
  it("closes with a finished event when nothing is running", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/stream");
    assert.equal(res.headers.get("content-type"), "text/event-stream");

    const events = parseEvents(await res.text());
    assert.deepEqual(events, [
      { event: "finished", data: { running: false, pagesDownloaded: 0, pagesFailed: 0 } },
    ]);
  });

  it("streams the session log until the session ends", async () => {
    stubFetch({ "https://example.com/": "<title>Home</title>" });
    const { app, controller } = createTestApp();
    const start = await (await app.request("/api/start", postJson({ url: "https://example.com" }))).json();

    const res = await app.request("/api/stream");
    const events = parseEvents(await res.text());
    await controller.waitForIdle();

    const last = events.at(-1);
    assert.equal(last?.event, "finished");
    assert.equal(last?.data.sessionId, start.sessionId);
    assert.equal(last?.data.state, "completed");

    const messages = events.filter((e) => e.event === "log").map((e) => e.data.message);
    assert.equal(messages[0], "Starting website scrape: https://example.com/");
    assert.ok(messages.includes("Scraping completed successfully!"));
    assert.equal(events.filter((e) => e.event === "finished").length, 1);
  });
});

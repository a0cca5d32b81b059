import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createTestApp } from "./test-helpers.js";

describe("createApp", () => {
  it("answers health checks", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");
    assert.equal(res.status, 200);
    assert.equal((await res.json()).status, "ok");
  });

  it("allows configured and local origins", async () => {
    const { app } = createTestApp();

    const configured = await app.request("/health", { headers: { origin: "https://dashboard.example.com" } });
    assert.equal(configured.headers.get("Access-Control-Allow-Origin"), "https://dashboard.example.com");

    const local = await app.request("/health", { headers: { origin: "http://localhost:5173" } });
    assert.equal(local.headers.get("Access-Control-Allow-Origin"), "http://localhost:5173");

    const other = await app.request("/health", { headers: { origin: "https://elsewhere.example.org" } });
    assert.equal(other.headers.get("Access-Control-Allow-Origin"), null);
  });
});

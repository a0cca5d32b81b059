import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { extractTitle } from "./page-metadata.js";

describe("extractTitle", () => {
  it("prefers the title element", () => {
    const html = "<html><head><title>  Pricing \n  Plans </title></head><body><h1>Ignored</h1></body></html>";
    assert.equal(extractTitle(html, "https://example.com/pricing"), "Pricing Plans");
  });

  it("falls back to the first heading", () => {
    assert.equal(extractTitle("<h1>Our <em>Team</em></h1><h1>Second</h1>", "https://example.com/team"), "Our Team");
  });

  it("falls back to the decoded path", () => {
    assert.equal(extractTitle("<p>No headings</p>", "https://example.com/docs/a%20b"), "/docs/a b");
    assert.equal(extractTitle("", "https://example.com"), "/");
  });
});

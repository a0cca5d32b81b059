import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { log, runWithLogCallback, setLogCallback } from "./logger.js";
import type { LogLevel } from "./types.js";

afterEach(() => {
  setLogCallback(null);
});

describe("log", () => {
  it("routes entries to the callback of the surrounding run", async () => {
    const first: string[] = [];
    const second: string[] = [];

    await Promise.all([
      runWithLogCallback(
        (level, message) => {
          first.push(`${level}:${message}`);
        },
        async () => {
          await Promise.resolve();
          log.info("from first");
        }
      ),
      runWithLogCallback(
        (level, message, url) => {
          second.push(`${level}:${message}:${url}`);
        },
        async () => {
          log.warn("from second", "https://example.com/");
        }
      ),
    ]);

    assert.deepEqual(first, ["info:from first"]);
    assert.deepEqual(second, ["warn:from second:https://example.com/"]);
  });

  it("falls back to the process-wide callback outside a run", () => {
    const seen: Array<[LogLevel, string]> = [];
    setLogCallback((level, message) => {
      seen.push([level, message]);
    });

    log.error("boom");
    log.debug("details");

    assert.deepEqual(seen, [
      ["error", "boom"],
      ["debug", "details"],
    ]);
  });
});

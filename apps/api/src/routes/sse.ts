import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type { AppEnv } from "../env.js";

const KEEP_ALIVE_MS = 30_000;

const app = new Hono<AppEnv>();

// Live scrape log: replays the current session's entries, then follows it until it finishes
app.get("/", (c) => {
  const controller = c.get("controller");

  return streamSSE(c, async (stream) => {
    let writes = Promise.resolve();
    let closed = false;

    const send = (event: "log" | "finished" | "ping", data: unknown) => {
      writes = writes
        .then(() => (closed ? undefined : stream.writeSSE({ event, data: JSON.stringify(data) })))
        .catch(() => {
          // Client went away; the abort handler does the cleanup
          closed = true;
        });
    };

    // Snapshot and subscribe in the same tick so no entry is lost or repeated
    const active = controller.activeSession;
    const backlog = controller.logs();
    backlog.forEach((entry) => send("log", entry));

    if (!active) {
      send("finished", controller.status());
      await writes;
      return;
    }

    let keepAlive: ReturnType<typeof setInterval> | undefined;
    const cleanups: Array<() => void> = [];

    await new Promise<void>((resolve) => {
      const done = () => {
        clearInterval(keepAlive);
        cleanups.forEach((cleanup) => cleanup());
        resolve();
      };

      cleanups.push(
        controller.subscribe((entry, sessionId) => {
          if (sessionId === active.id) send("log", entry);
        }),
        controller.onFinished((event) => {
          if (event.sessionId !== active.id) return;
          send("finished", { ...controller.status(), error: event.error });
          void writes.then(done, done);
        })
      );

      keepAlive = setInterval(() => send("ping", { timestamp: Date.now() }), KEEP_ALIVE_MS);

      stream.onAbort(() => {
        closed = true;
        done();
      });
    });
  });
});

export const sseRoutes = app;

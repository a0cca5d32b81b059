import path from "node:path";
import { Hono } from "hono";
import type { StorageAdapter } from "@sitemirror/storage";
import type { AppEnv } from "../env.js";

const app = new Hono<AppEnv>();

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".xml": "application/xml; charset=utf-8",
  ".txt": "text/plain; charset=utf-8",
};

function getContentType(filePath: string): string {
  return CONTENT_TYPES[path.posix.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

async function findFile(stores: StorageAdapter[], filePath: string): Promise<Buffer | null> {
  for (const storage of stores) {
    if (await storage.exists(filePath)) {
      return storage.readFile(filePath);
    }
  }
  return null;
}

// Serve the offline copy and sitemap archive. Site output wins on a name clash.
app.get("/*", async (c) => {
  const decoded = safeDecode(c.req.path.replace(/^\/files\/?/, ""));
  const filePath = decoded || "index.html";
  if (decoded === null || filePath.split("/").includes("..")) {
    return c.json({ error: "File not found" }, 404);
  }

  try {
    const content = await findFile([c.get("siteStorage"), c.get("sitemapStorage")], filePath);
    if (!content) {
      return c.json({ error: "File not found" }, 404);
    }

    return new Response(new Uint8Array(content), {
      headers: {
        "Content-Type": getContentType(filePath),
        "Cache-Control": "no-store",
      },
    });
  } catch (error) {
    if (isMissingFileError(error)) {
      return c.json({ error: "File not found" }, 404);
    }
    console.error("[files] Failed to read output file", { filePath, error });
    return c.json({ error: "Failed to read file" }, 500);
  }
});

export const filesRoutes = app;

import type { StorageAdapter } from "./adapter.js";

/**
 * In-process store, used by tests and by callers that only want the report.
 */
export class MemoryStorage implements StorageAdapter {
  private files = new Map<string, Buffer>();

  async writeFile(filePath: string, content: Buffer | string): Promise<void> {
    const key = normalizeKey(filePath);
    this.files.set(key, typeof content === "string" ? Buffer.from(content, "utf8") : Buffer.from(content));
  }

  async readFile(filePath: string): Promise<Buffer> {
    const content = this.files.get(normalizeKey(filePath));
    if (!content) {
      throw new Error(`missing file: ${filePath}`);
    }
    return Buffer.from(content);
  }

  async listFiles(prefix: string): Promise<string[]> {
    const normalized = normalizeKey(prefix);
    const dirPrefix = normalized ? `${normalized}/` : "";
    return Array.from(this.files.keys())
      .filter((key) => key === normalized || key.startsWith(dirPrefix))
      .sort();
  }

  async deleteDir(dirPath: string): Promise<void> {
    for (const key of await this.listFiles(dirPath)) {
      this.files.delete(key);
    }
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(normalizeKey(filePath));
  }

  getPublicUrl(filePath: string): string {
    return `memory://${normalizeKey(filePath)}`;
  }

  /** Convenience for tests: the stored content decoded as UTF-8. */
  readText(filePath: string): string | undefined {
    return this.files.get(normalizeKey(filePath))?.toString("utf8");
  }
}

function normalizeKey(filePath: string): string {
  return filePath
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment && segment !== ".")
    .join("/");
}

import fsp from "node:fs/promises";
import path from "node:path";
import fs from "fs-extra";
import type { StorageAdapter } from "./adapter.js";

export class LocalStorage implements StorageAdapter {
  constructor(private basePath: string) {}

  get rootPath(): string {
    return path.resolve(this.basePath);
  }

  async writeFile(filePath: string, content: Buffer | string): Promise<void> {
    await fs.outputFile(this.resolve(filePath), content);
  }

  async readFile(filePath: string): Promise<Buffer> {
    return fs.readFile(this.resolve(filePath));
  }

  async listFiles(prefix: string): Promise<string[]> {
    const fullPath = this.resolve(prefix);
    const files: string[] = [];

    async function walk(dir: string) {
      if (!(await fs.pathExists(dir))) {
        return;
      }
      const entries = await fsp.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(entryPath);
        } else {
          files.push(entryPath);
        }
      }
    }

    await walk(fullPath);
    return files.map((f) => toKey(path.relative(this.rootPath, f))).sort();
  }

  async deleteDir(dirPath: string): Promise<void> {
    await fs.remove(this.resolve(dirPath));
  }

  async exists(filePath: string): Promise<boolean> {
    return fs.pathExists(this.resolve(filePath));
  }

  getPublicUrl(filePath: string): string {
    return `/files/${toKey(filePath)}`;
  }

  private resolve(filePath: string): string {
    const fullPath = path.resolve(this.basePath, filePath);
    const root = this.rootPath;
    if (fullPath !== root && !fullPath.startsWith(root + path.sep)) {
      throw new Error(`Path escapes storage root: ${filePath}`);
    }
    return fullPath;
  }
}

function toKey(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

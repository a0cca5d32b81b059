/**
 * Key → bytes store the scraper persists its output through.
 * Keys are forward-slash relative paths such as `pages/about.html`.
 */
export interface StorageAdapter {
  writeFile(path: string, content: Buffer | string): Promise<void>;
  readFile(path: string): Promise<Buffer>;
  listFiles(prefix: string): Promise<string[]>;
  deleteDir(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  getPublicUrl(path: string): string;
}

export type StorageType = "local" | "memory";

export interface StorageConfig {
  type: StorageType;
  localPath?: string;
}

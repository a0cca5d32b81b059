import type { StorageAdapter, StorageConfig } from "./adapter.js";
import { LocalStorage } from "./local.js";
import { MemoryStorage } from "./memory.js";

export function createStorage(config: StorageConfig): StorageAdapter {
  if (config.type === "memory") {
    return new MemoryStorage();
  }
  return new LocalStorage(config.localPath || "./offline_output");
}

/**
 * Storage rooted at `localPath`, or in memory when STORAGE_TYPE=memory.
 */
export function getStorage(localPath: string): StorageAdapter {
  const rawType = (process.env.STORAGE_TYPE || "").trim().toLowerCase();
  if (rawType === "memory") {
    return createStorage({ type: "memory" });
  }
  if (rawType && rawType !== "local") {
    console.warn(`[storage] Unsupported STORAGE_TYPE="${process.env.STORAGE_TYPE}". Falling back to local.`);
  }
  return createStorage({ type: "local", localPath });
}

export type { StorageAdapter, StorageConfig, StorageType } from "./adapter.js";
export { LocalStorage } from "./local.js";
export { MemoryStorage } from "./memory.js";

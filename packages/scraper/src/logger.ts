import type { LogLevel } from "./types.js";
import { AsyncLocalStorage } from "node:async_hooks";

export type LogCallback = (level: LogLevel, message: string, url?: string) => void | Promise<void>;

const logCallbackStorage = new AsyncLocalStorage<LogCallback | null>();
let fallbackLogCallback: LogCallback | null = null;

export function setLogCallback(callback: LogCallback | null): void {
  fallbackLogCallback = callback;
}

export function runWithLogCallback<T>(callback: LogCallback | null, fn: () => Promise<T>): Promise<T> {
  return logCallbackStorage.run(callback, fn);
}

function getLogCallback(): LogCallback | null {
  const scoped = logCallbackStorage.getStore();
  return scoped === undefined ? fallbackLogCallback : scoped;
}

function emit(level: LogLevel, message: string, url?: string): void {
  const callback = getLogCallback();
  if (!callback) {
    return writeToConsole(level, message);
  }
  const result = callback(level, message, url);
  if (result instanceof Promise) {
    result.catch((error: unknown) => {
      console.error("[error] log callback failed:", error);
    });
  }
}

function writeToConsole(level: LogLevel, message: string): void {
  switch (level) {
    case "debug":
      if (process.env.DEBUG_SCRAPER === "1") {
        console.log("[debug]", message);
      }
      return;
    case "info":
      console.log("[info]", message);
      return;
    case "warn":
      console.warn("[warn]", message);
      return;
    case "error":
      console.error("[error]", message);
      return;
  }
}

export const log = {
  debug: (message: string, url?: string) => emit("debug", message, url),
  info: (message: string, url?: string) => emit("info", message, url),
  warn: (message: string, url?: string) => emit("warn", message, url),
  error: (message: string, url?: string) => emit("error", message, url),
};

export interface ServerConfig {
  port: number;
  outputDir: string;
  sitemapOutputDir: string;
  requestTimeoutMs: number;
  delayMs: number;
  userAgent?: string;
  corsAllowedOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readPositiveInt(env.PORT, 5000),
    outputDir: env.OUTPUT_DIR?.trim() || "offline_output",
    sitemapOutputDir: env.SITEMAP_OUTPUT_DIR?.trim() || "sitemap_output",
    requestTimeoutMs: readPositiveInt(env.CRAWL_REQUEST_TIMEOUT_MS, 30_000),
    delayMs: readNonNegativeInt(env.CRAWL_DELAY_MS, 500),
    userAgent: env.CRAWL_USER_AGENT?.trim() || undefined,
    corsAllowedOrigins: (env.CORS_ALLOWED_ORIGINS || "")
      .split(",")
      .map((value) => value.trim())
      .filter(Boolean),
  };
}

export function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

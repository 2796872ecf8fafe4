import {
  crawlerCaps,
  defaultCrawlerConfig,
  type CrawlerConfig,
  validateCrawlerConfig
} from "../../application/crawl-products/crawler.config";

export const runtimeCaps = {
  timeoutMs: { min: 100, max: 120000 },
  chunkSize: { min: 1, max: 10000000 }
} as const;

export type RuntimeConfig = {
  crawlerConfig: CrawlerConfig;
  timeoutMs: number;
};

export type PrepareConfig = {
  inputFile: string;
  outputDir: string;
  prefix: string;
  chunkSize: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalStatusList = (env: NodeJS.ProcessEnv, name: string): number[] | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  return raw.split(",").map((part) => {
    const value = Number(part.trim());
    const { min, max } = crawlerCaps.retryStatus;
    if (part.trim() === "" || !Number.isInteger(value) || value < min || value > max) {
      throw new Error(`${name}=${raw} must be a comma-separated list of HTTP statuses in [${min}..${max}]`);
    }
    return value;
  });
};

const readString = (env: NodeJS.ProcessEnv, name: string, fallback: string): string => {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const crawlerConfig = validateCrawlerConfig({
    concurrency: parseOptionalIntInRange(env, "CRAWL_CONCURRENCY", crawlerCaps.concurrency) ?? defaultCrawlerConfig.concurrency,
    maxRetries: parseOptionalIntInRange(env, "CRAWL_MAX_RETRIES", crawlerCaps.maxRetries) ?? defaultCrawlerConfig.maxRetries,
    batchSize: parseOptionalIntInRange(env, "CRAWL_BATCH_SIZE", crawlerCaps.batchSize) ?? defaultCrawlerConfig.batchSize,
    delayMinMs: parseOptionalIntInRange(env, "CRAWL_DELAY_MIN_MS", crawlerCaps.delayMs) ?? defaultCrawlerConfig.delayMinMs,
    delayMaxMs: parseOptionalIntInRange(env, "CRAWL_DELAY_MAX_MS", crawlerCaps.delayMs) ?? defaultCrawlerConfig.delayMaxMs,
    rateLimitBackoffMs:
      parseOptionalIntInRange(env, "CRAWL_RATE_LIMIT_BACKOFF_MS", crawlerCaps.backoffMs) ?? defaultCrawlerConfig.rateLimitBackoffMs,
    timeoutBackoffMs:
      parseOptionalIntInRange(env, "CRAWL_TIMEOUT_BACKOFF_MS", crawlerCaps.backoffMs) ?? defaultCrawlerConfig.timeoutBackoffMs,
    cooldownMs: parseOptionalIntInRange(env, "CRAWL_COOLDOWN_MS", crawlerCaps.cooldownMs) ?? defaultCrawlerConfig.cooldownMs,
    progressEvery: parseOptionalIntInRange(env, "CRAWL_PROGRESS_EVERY", crawlerCaps.progressEvery) ?? defaultCrawlerConfig.progressEvery,
    retryStatuses: parseOptionalStatusList(env, "CRAWL_RETRY_STATUSES") ?? defaultCrawlerConfig.retryStatuses
  });

  const timeoutMs =
    parseOptionalIntInRange(env, "CATALOG_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 10000;

  return { crawlerConfig, timeoutMs };
};

export const loadPrepareConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): PrepareConfig => ({
  inputFile: readString(env, "PREPARE_INPUT_FILE", "id.csv"),
  outputDir: readString(env, "PREPARE_OUTPUT_DIR", "API_ids"),
  prefix: readString(env, "PREPARE_PREFIX", "id"),
  chunkSize: parseOptionalIntInRange(env, "PREPARE_CHUNK_SIZE", runtimeCaps.chunkSize) ?? 50000
});

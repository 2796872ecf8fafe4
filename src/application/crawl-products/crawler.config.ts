export type CrawlerConfig = {
  concurrency: number;
  maxRetries: number;
  batchSize: number;
  delayMinMs: number;
  delayMaxMs: number;
  rateLimitBackoffMs: number;
  timeoutBackoffMs: number;
  cooldownMs: number;
  progressEvery: number;
  retryStatuses: number[];
};

export type CrawlerConfigInput = Partial<CrawlerConfig>;

export const defaultCrawlerConfig: CrawlerConfig = {
  concurrency: 100,
  maxRetries: 3,
  batchSize: 1000,
  delayMinMs: 500,
  delayMaxMs: 1000,
  rateLimitBackoffMs: 5000,
  timeoutBackoffMs: 2000,
  cooldownMs: 3000,
  progressEvery: 200,
  retryStatuses: []
};

export const crawlerCaps = {
  concurrency: { min: 1, max: 500 },
  maxRetries: { min: 1, max: 20 },
  batchSize: { min: 1, max: 100000 },
  delayMs: { min: 0, max: 60000 },
  backoffMs: { min: 0, max: 120000 },
  cooldownMs: { min: 0, max: 600000 },
  progressEvery: { min: 1, max: 100000 },
  retryStatus: { min: 400, max: 599 }
} as const;

// 404 and 429 have their own handling and cannot be listed as generic retry statuses.
const reservedStatuses = new Set([404, 429]);

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateCrawlerConfig = (config: CrawlerConfig): CrawlerConfig => {
  assertIntegerInRange("concurrency", config.concurrency, crawlerCaps.concurrency.min, crawlerCaps.concurrency.max);
  assertIntegerInRange("maxRetries", config.maxRetries, crawlerCaps.maxRetries.min, crawlerCaps.maxRetries.max);
  assertIntegerInRange("batchSize", config.batchSize, crawlerCaps.batchSize.min, crawlerCaps.batchSize.max);
  assertIntegerInRange("delayMinMs", config.delayMinMs, crawlerCaps.delayMs.min, crawlerCaps.delayMs.max);
  assertIntegerInRange("delayMaxMs", config.delayMaxMs, crawlerCaps.delayMs.min, crawlerCaps.delayMs.max);
  assertIntegerInRange("rateLimitBackoffMs", config.rateLimitBackoffMs, crawlerCaps.backoffMs.min, crawlerCaps.backoffMs.max);
  assertIntegerInRange("timeoutBackoffMs", config.timeoutBackoffMs, crawlerCaps.backoffMs.min, crawlerCaps.backoffMs.max);
  assertIntegerInRange("cooldownMs", config.cooldownMs, crawlerCaps.cooldownMs.min, crawlerCaps.cooldownMs.max);
  assertIntegerInRange("progressEvery", config.progressEvery, crawlerCaps.progressEvery.min, crawlerCaps.progressEvery.max);

  if (config.delayMinMs > config.delayMaxMs) {
    throw new Error(`delayMinMs=${config.delayMinMs} must not exceed delayMaxMs=${config.delayMaxMs}`);
  }

  for (const status of config.retryStatuses) {
    assertIntegerInRange("retryStatuses", status, crawlerCaps.retryStatus.min, crawlerCaps.retryStatus.max);
    if (reservedStatuses.has(status)) {
      throw new Error(`retryStatuses must not contain ${status}`);
    }
  }

  return config;
};

export const resolveCrawlerConfig = (input: CrawlerConfigInput = {}): CrawlerConfig =>
  validateCrawlerConfig({
    ...defaultCrawlerConfig,
    ...input,
    retryStatuses: [...new Set(input.retryStatuses ?? defaultCrawlerConfig.retryStatuses)]
  });

export type CrawlFailureCode = "artifact_write_failed" | "failure_log_write_failed" | "worker_failed";

export type CrawlErrorContext = {
  batch: number;
  identifiers?: number;
  id?: string;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class CrawlFatalError extends Error {
  readonly code: CrawlFailureCode;
  readonly context: CrawlErrorContext;

  constructor(args: { code: CrawlFailureCode; message: string; context: CrawlErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "CrawlFatalError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapArtifactWriteFailure = (reason: unknown, context: CrawlErrorContext) =>
  new CrawlFatalError({
    code: "artifact_write_failed",
    message: `Batch artifact write failed at batch=${context.batch}: ${toErrorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });

export const wrapFailureLogWriteFailure = (reason: unknown, context: CrawlErrorContext) =>
  new CrawlFatalError({
    code: "failure_log_write_failed",
    message: `Failure log write failed at batch=${context.batch}: ${toErrorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });

export const wrapWorkerFailure = (reason: unknown, context: CrawlErrorContext) =>
  new CrawlFatalError({
    code: "worker_failed",
    message: `Fetch worker failed unexpectedly at batch=${context.batch}${context.id != null ? `, id=${context.id}` : ""}: ${toErrorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });

export type CrawlRunSummary = {
  startBatch: number;
  totalBatches: number;
  batchesProcessed: number;
  successes: number;
  failures: number;
  failuresOnDisk: number;
  rateLimitHits: number;
  failuresByReason: Partial<Record<string, number>>;
  elapsedMs: number;
};

/**
 * Per-run counters. Passed explicitly to fetch workers; the rate-limit
 * counter is observability only and never drives control flow.
 */
export type CrawlRunTracker = ReturnType<typeof createCrawlRunTracker>;

export const createCrawlRunTracker = (now: () => number = Date.now) => {
  const startedAt = now();
  let rateLimitHits = 0;
  let batchesProcessed = 0;
  let successes = 0;
  let failures = 0;
  const failuresByReason: Partial<Record<string, number>> = {};

  return {
    recordRateLimitHit: () => {
      rateLimitHits += 1;
      return rateLimitHits;
    },
    rateLimitHits: () => rateLimitHits,
    addBatch: (batch: { successes: number; failureReasons: string[] }) => {
      batchesProcessed += 1;
      successes += batch.successes;
      failures += batch.failureReasons.length;
      for (const reason of batch.failureReasons) {
        failuresByReason[reason] = (failuresByReason[reason] ?? 0) + 1;
      }
    },
    successes: () => successes,
    summary: (args: { startBatch: number; totalBatches: number; failuresOnDisk: number }): CrawlRunSummary => ({
      startBatch: args.startBatch,
      totalBatches: args.totalBatches,
      batchesProcessed,
      successes,
      failures,
      failuresOnDisk: args.failuresOnDisk,
      rateLimitHits,
      failuresByReason: { ...failuresByReason },
      elapsedMs: now() - startedAt
    })
  };
};

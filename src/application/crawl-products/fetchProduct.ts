import { failure, failureErrorCode, success, type FetchOutcome } from "../../core/fetch/fetchOutcome";
import { transformProduct } from "../../core/product/transformProduct";
import { CatalogTimeoutError, type CatalogClient, type CatalogResponse } from "../../ports/CatalogClient";
import type { Limiter } from "../../shared/concurrency/limiter";
import { driveAttempts, sleep, type AttemptDecision } from "../../shared/retry/retry";
import type { CrawlRunTracker } from "./crawl.error-handler";
import type { CrawlerConfig } from "./crawler.config";

export type AttemptResult =
  | { kind: "response"; response: CatalogResponse }
  | { kind: "error"; error: unknown };

export type FetchEvent =
  | "fetch.success"
  | "fetch.not_found"
  | "fetch.http_status"
  | "fetch.rate_limited"
  | "fetch.timeout"
  | "fetch.exception";

export type FetchAttemptLog = {
  level: "info" | "warn" | "error";
  payload: { event: FetchEvent; id: string; attempt: number } & Record<string, string | number | boolean>;
};

export type ClassifiedAttempt = {
  decision: AttemptDecision<FetchOutcome>;
  log: FetchAttemptLog;
};

export type AttemptContext = {
  attempt: number;
  maxAttempts: number;
  rateLimitBackoffMs: number;
  timeoutBackoffMs: number;
  retryStatuses: ReadonlySet<number>;
};

export type RetryPolicy = Pick<
  CrawlerConfig,
  "maxRetries" | "delayMinMs" | "delayMaxMs" | "rateLimitBackoffMs" | "timeoutBackoffMs" | "retryStatuses"
>;

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

const done = (outcome: FetchOutcome): AttemptDecision<FetchOutcome> => ({ action: "done", outcome });

/**
 * Maps the result of one request to either a terminal outcome or a retry
 * with its wait. Backoff waits scale linearly with the attempt number.
 */
export const classifyAttempt = (id: string, result: AttemptResult, ctx: AttemptContext): ClassifiedAttempt => {
  const { attempt, maxAttempts } = ctx;

  if (result.kind === "error") {
    if (result.error instanceof CatalogTimeoutError) {
      const waitMs = ctx.timeoutBackoffMs * attempt;
      return {
        decision: { action: "retry", delayMs: waitMs, exhausted: failure(id, { kind: "timeout_exhausted" }) },
        log: { level: "warn", payload: { event: "fetch.timeout", id, attempt, maxAttempts, waitMs } }
      };
    }

    const message = toErrorMessage(result.error);
    return {
      decision: done(failure(id, { kind: "exception", message })),
      log: { level: "error", payload: { event: "fetch.exception", id, attempt, message } }
    };
  }

  const { status, payload } = result.response;

  if (status === 429) {
    const waitMs = ctx.rateLimitBackoffMs * attempt;
    return {
      decision: { action: "retry", delayMs: waitMs, exhausted: failure(id, { kind: "rate_limited_exhausted" }) },
      log: { level: "warn", payload: { event: "fetch.rate_limited", id, attempt, maxAttempts, waitMs } }
    };
  }

  if (status === 404) {
    return {
      decision: done(failure(id, { kind: "not_found" })),
      log: { level: "warn", payload: { event: "fetch.not_found", id, attempt } }
    };
  }

  if (status !== 200) {
    if (ctx.retryStatuses.has(status)) {
      const waitMs = ctx.rateLimitBackoffMs * attempt;
      return {
        decision: { action: "retry", delayMs: waitMs },
        log: { level: "warn", payload: { event: "fetch.http_status", id, attempt, status, retry: true, waitMs } }
      };
    }

    return {
      decision: done(failure(id, { kind: "http_status", status })),
      log: { level: "warn", payload: { event: "fetch.http_status", id, attempt, status, retry: false } }
    };
  }

  try {
    const record = transformProduct(payload);
    return {
      decision: done(success(id, record)),
      log: { level: "info", payload: { event: "fetch.success", id, attempt } }
    };
  } catch (err) {
    const message = toErrorMessage(err);
    return {
      decision: done(failure(id, { kind: "exception", message })),
      log: { level: "error", payload: { event: "fetch.exception", id, attempt, message } }
    };
  }
};

export const emitFetchLog = (log: FetchAttemptLog) => {
  const write = log.level === "info" ? console.log : log.level === "warn" ? console.warn : console.error;
  write(JSON.stringify(log.payload));
};

export type ProductFetcherDeps = {
  client: CatalogClient;
  limiter: Limiter;
  policy: RetryPolicy;
  tracker: Pick<CrawlRunTracker, "recordRateLimitHit">;
  sleepFn?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

export type ProductFetcher = (id: string) => Promise<FetchOutcome>;

/**
 * Builds the per-identifier fetch. Each attempt holds one limiter slot for
 * the politeness delay, the request and its classification; backoff waits
 * happen after the slot is released. Per-identifier failures are returned,
 * never thrown.
 */
export const createProductFetcher = (deps: ProductFetcherDeps): ProductFetcher => {
  const { client, limiter, policy, tracker, sleepFn = sleep, randomFn = Math.random } = deps;
  const retryStatuses = new Set(policy.retryStatuses);

  const politenessDelayMs = () => {
    const r = Math.min(1, Math.max(0, randomFn()));
    return policy.delayMinMs + r * (policy.delayMaxMs - policy.delayMinMs);
  };

  const attemptOnce = async (id: string, attempt: number): Promise<AttemptDecision<FetchOutcome>> => {
    const release = await limiter.acquire();
    try {
      await sleepFn(politenessDelayMs());

      let result: AttemptResult;
      try {
        result = { kind: "response", response: await client.getProduct(id) };
      } catch (error) {
        result = { kind: "error", error };
      }

      if (result.kind === "response" && result.response.status === 429) {
        tracker.recordRateLimitHit();
      }

      const { decision, log } = classifyAttempt(id, result, {
        attempt,
        maxAttempts: policy.maxRetries,
        rateLimitBackoffMs: policy.rateLimitBackoffMs,
        timeoutBackoffMs: policy.timeoutBackoffMs,
        retryStatuses
      });
      emitFetchLog(log);
      return decision;
    } finally {
      release();
    }
  };

  return (id) =>
    driveAttempts((attempt) => attemptOnce(id, attempt), {
      maxAttempts: policy.maxRetries,
      exhausted: () => failure(id, { kind: "retries_exhausted" }),
      sleepFn,
      onGiveUp: ({ attempt, maxAttempts, outcome }) => {
        const error = outcome.kind === "failure" ? failureErrorCode(outcome.reason) : "none";
        console.error(JSON.stringify({ event: "fetch.give_up", id, attempt, maxAttempts, error }));
      }
    });
};

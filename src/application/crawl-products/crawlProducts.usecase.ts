import { sliceBatch, countBatches, type Batch } from "../../core/batch/batchPlan";
import { toFailureRecord, type FetchFailure, type FetchOutcome } from "../../core/fetch/fetchOutcome";
import type { ProductRecord } from "../../core/product/product.types";
import type { BatchArtifactStore } from "../../ports/BatchArtifactStore";
import type { CatalogClient } from "../../ports/CatalogClient";
import type { FailureSink } from "../../ports/FailureSink";
import { createLimiter } from "../../shared/concurrency/limiter";
import { sleep } from "../../shared/retry/retry";
import { resolveStartBatch } from "./checkpoint";
import {
  createCrawlRunTracker,
  type CrawlRunSummary,
  wrapArtifactWriteFailure,
  wrapFailureLogWriteFailure,
  wrapWorkerFailure
} from "./crawl.error-handler";
import type { CrawlerConfigInput } from "./crawler.config";
import { resolveCrawlerConfig } from "./crawler.config";
import { createProductFetcher, type ProductFetcher } from "./fetchProduct";

export type CrawlProductsDeps = {
  client: CatalogClient;
  artifacts: BatchArtifactStore;
  failures: FailureSink;
  identifiers: readonly string[];
  config: CrawlerConfigInput;
  sleepFn?: (ms: number) => Promise<void>;
  randomFn?: () => number;
  now?: () => number;
};

const runBatch = async (batch: Batch, fetchProduct: ProductFetcher, progressEvery: number): Promise<FetchOutcome[]> => {
  let completed = 0;
  const total = batch.identifiers.length;

  const settled = await Promise.allSettled(
    batch.identifiers.map(async (id) => {
      const outcome = await fetchProduct(id);
      completed += 1;
      if (completed % progressEvery === 0) {
        console.log(JSON.stringify({ event: "crawl.batch_progress", batch: batch.index, completed, total }));
      }
      return outcome;
    })
  );

  // Every worker has settled here; only then is the first infrastructure fault raised.
  const outcomes: FetchOutcome[] = [];
  for (let i = 0; i < settled.length; i += 1) {
    const result = settled[i];
    if (result.status === "rejected") {
      throw wrapWorkerFailure(result.reason, { batch: batch.index, identifiers: total, id: batch.identifiers[i] });
    }
    outcomes.push(result.value);
  }
  return outcomes;
};

/**
 * Crawls product records batch by batch, resuming after the last batch that
 * has a persisted artifact. Batches run strictly in order; a batch's
 * artifact is written only after every fetch in it reached a terminal outcome.
 */
export const crawlProducts = async (deps: CrawlProductsDeps): Promise<CrawlRunSummary> => {
  const { client, artifacts, failures, identifiers, sleepFn = sleep, randomFn } = deps;
  const config = resolveCrawlerConfig(deps.config);
  const tracker = createCrawlRunTracker(deps.now);
  const limiter = createLimiter(config.concurrency);
  const fetchProduct = createProductFetcher({ client, limiter, policy: config, tracker, sleepFn, randomFn });

  const totalBatches = countBatches(identifiers.length, config.batchSize);
  const startBatch = await resolveStartBatch(artifacts);
  console.log(JSON.stringify({ event: "crawl.resume", startBatch, totalBatches, identifiers: identifiers.length }));

  for (let index = startBatch; index <= totalBatches; index += 1) {
    const batch = sliceBatch(identifiers, index, config.batchSize);
    console.log(JSON.stringify({
      event: "crawl.batch_started",
      batch: index,
      totalBatches,
      identifiers: batch.identifiers.length
    }));

    const outcomes = await runBatch(batch, fetchProduct, config.progressEvery);

    const records: ProductRecord[] = [];
    const failed: FetchFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === "success") records.push(outcome.record);
      else failed.push(outcome);
    }

    try {
      await artifacts.write(index, records);
    } catch (error) {
      throw wrapArtifactWriteFailure(error, { batch: index, identifiers: batch.identifiers.length });
    }

    if (failed.length > 0) {
      try {
        await failures.flush(failed.map(toFailureRecord));
      } catch (error) {
        throw wrapFailureLogWriteFailure(error, { batch: index, identifiers: batch.identifiers.length });
      }
      console.warn(JSON.stringify({ event: "crawl.failures_flushed", batch: index, count: failed.length }));
    }

    tracker.addBatch({ successes: records.length, failureReasons: failed.map((f) => f.reason.kind) });
    console.log(JSON.stringify({
      event: "crawl.batch_completed",
      batch: index,
      successes: records.length,
      failures: failed.length,
      totalSuccesses: tracker.successes()
    }));

    if (index < totalBatches && config.cooldownMs > 0) {
      await sleepFn(config.cooldownMs);
    }
  }

  const summary = tracker.summary({
    startBatch,
    totalBatches,
    failuresOnDisk: await failures.countRecorded()
  });
  console.log(JSON.stringify({ event: "crawl.completed", ...summary }));
  return summary;
};

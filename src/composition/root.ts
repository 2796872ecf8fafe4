import { crawlProducts } from "../application/crawl-products/crawlProducts.usecase";
import type { CrawlRunSummary } from "../application/crawl-products/crawl.error-handler";
import {
  prepareIdentifiers,
  type PrepareIdentifiersSummary
} from "../application/prepare-identifiers/prepareIdentifiers.usecase";
import { CatalogHttpClient } from "../infrastructure/catalog/CatalogHttpClient";
import { readIdentifiers } from "../infrastructure/csv/readIdentifiers";
import { CsvFailureSink } from "../infrastructure/fs/CsvFailureSink";
import { FsBatchArtifactStore } from "../infrastructure/fs/FsBatchArtifactStore";
import { loadEnv } from "../shared/config/env";
import { loadPrepareConfigFromEnv, loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const runCrawl = async (): Promise<CrawlRunSummary> => {
  const env = loadEnv();
  const { crawlerConfig, timeoutMs } = loadRuntimeConfigFromEnv();

  const client = new CatalogHttpClient(env.CATALOG_BASE_URL, timeoutMs);
  const artifacts = new FsBatchArtifactStore(env.CRAWL_OUTPUT_DIR);
  const failures = new CsvFailureSink(env.CRAWL_FAILED_FILE);
  const identifiers = await readIdentifiers(env.CRAWL_INPUT_FILE, env.CRAWL_ID_COLUMN);

  return crawlProducts({ client, artifacts, failures, identifiers, config: crawlerConfig });
};

export const runPrepareIdentifiers = async (): Promise<PrepareIdentifiersSummary> =>
  prepareIdentifiers(loadPrepareConfigFromEnv());

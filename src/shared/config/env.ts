export type Env = {
  CATALOG_BASE_URL: string;
  CRAWL_INPUT_FILE: string;
  CRAWL_ID_COLUMN: string;
  CRAWL_OUTPUT_DIR: string;
  CRAWL_FAILED_FILE: string;
};

export const defaultCatalogBaseUrl = "https://api.tiki.vn/product-detail/api/v1/products";

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const readPath = (env: NodeJS.ProcessEnv, name: string, fallback: string): string => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  return raw.trim();
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const CATALOG_BASE_URL = validateHttpUrl("CATALOG_BASE_URL", env.CATALOG_BASE_URL ?? defaultCatalogBaseUrl);
  const CRAWL_INPUT_FILE = readPath(env, "CRAWL_INPUT_FILE", "API_ids/id_part_1.csv");
  const CRAWL_ID_COLUMN = readPath(env, "CRAWL_ID_COLUMN", "id");
  const CRAWL_OUTPUT_DIR = readPath(env, "CRAWL_OUTPUT_DIR", "catalog_batches");
  const CRAWL_FAILED_FILE = readPath(env, "CRAWL_FAILED_FILE", "failed_ids.csv");

  return { CATALOG_BASE_URL, CRAWL_INPUT_FILE, CRAWL_ID_COLUMN, CRAWL_OUTPUT_DIR, CRAWL_FAILED_FILE };
};

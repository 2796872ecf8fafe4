export type Batch = {
  index: number; // 1-based
  identifiers: string[];
};

export const countBatches = (total: number, batchSize: number): number =>
  total <= 0 ? 0 : Math.ceil(total / batchSize);

/**
 * Identifiers of batch `index`, by position in the input list only.
 */
export const sliceBatch = (identifiers: readonly string[], index: number, batchSize: number): Batch => {
  if (!Number.isInteger(index) || index < 1) {
    throw new Error(`batch index must be an integer >= 1. Received: ${index}`);
  }
  const start = (index - 1) * batchSize;
  const end = Math.min(start + batchSize, identifiers.length);
  return { index, identifiers: identifiers.slice(start, end) };
};

/**
 * Artifact file name for a batch, e.g. `catalog_batch_7.json`.
 */
export const batchArtifactName = (prefix: string, index: number): string => `${prefix}${index}.json`;

/**
 * Batch index encoded in an artifact file name, or undefined when the name
 * is not an artifact of this prefix (temp files included).
 */
export const parseBatchIndex = (prefix: string, fileName: string): number | undefined => {
  if (!fileName.startsWith(prefix) || !fileName.endsWith(".json")) return undefined;

  const digits = fileName.slice(prefix.length, fileName.length - ".json".length);
  if (!/^\d+$/.test(digits)) return undefined;

  const index = Number.parseInt(digits, 10);
  return Number.isSafeInteger(index) && index >= 1 ? index : undefined;
};

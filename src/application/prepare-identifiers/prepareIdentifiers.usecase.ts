import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { stringify } from "csv-stringify/sync";
import { readIdentifiers } from "../../infrastructure/csv/readIdentifiers";

export type PrepareIdentifiersConfig = {
  inputFile: string;
  outputDir: string;
  prefix: string;
  chunkSize: number;
};

export type PrepareIdentifiersSummary = {
  before: number;
  after: number;
  duplicates: number;
  files: string[];
};

/** First occurrence wins; order is preserved. */
export const dedupeIdentifiers = (identifiers: readonly string[]): string[] => [...new Set(identifiers)];

export const chunkIdentifiers = (identifiers: readonly string[], chunkSize: number): string[][] => {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error("chunkSize must be an integer >= 1");
  }

  const chunks: string[][] = [];
  for (let start = 0; start < identifiers.length; start += chunkSize) {
    chunks.push(identifiers.slice(start, start + chunkSize));
  }
  return chunks;
};

export const chunkFileName = (prefix: string, part: number): string => `${prefix}_part_${part}.csv`;

/**
 * Produces the crawler's input files: deduplicated identifiers split into
 * `<prefix>_part_<n>.csv` chunks with an `id` header.
 */
export const prepareIdentifiers = async (config: PrepareIdentifiersConfig): Promise<PrepareIdentifiersSummary> => {
  const identifiers = await readIdentifiers(config.inputFile);
  const unique = dedupeIdentifiers(identifiers);
  const duplicates = identifiers.length - unique.length;

  if (duplicates > 0) {
    console.warn(JSON.stringify({ event: "prepare.duplicates_removed", duplicates }));
  }

  await mkdir(config.outputDir, { recursive: true });
  const files: string[] = [];
  const chunks = chunkIdentifiers(unique, config.chunkSize);
  for (let i = 0; i < chunks.length; i += 1) {
    const filePath = path.join(config.outputDir, chunkFileName(config.prefix, i + 1));
    const rows = chunks[i].map((id) => ({ id }));
    await writeFile(filePath, stringify(rows, { header: true, columns: ["id"] }), "utf-8");
    files.push(filePath);
    console.log(JSON.stringify({ event: "prepare.chunk_written", file: filePath, rows: rows.length }));
  }

  const summary = { before: identifiers.length, after: unique.length, duplicates, files };
  console.log(JSON.stringify({ event: "prepare.completed", before: summary.before, after: summary.after, duplicates }));
  return summary;
};

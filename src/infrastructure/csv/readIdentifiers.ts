import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const toIdentifier = (value: unknown): string | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

/**
 * Identifiers from the `column` of a headered CSV, in file order.
 * Blank cells are dropped; values are trimmed. Duplicates are kept.
 */
export const parseIdentifiers = (csvText: string, column = "id"): string[] => {
  const rows: unknown = parse(csvText, { columns: true, skip_empty_lines: true, bom: true, trim: true });
  if (!Array.isArray(rows)) return [];

  const first: unknown = rows[0];
  if (isRecord(first) && !(column in first)) {
    throw new Error(`Input CSV has no "${column}" column`);
  }

  const identifiers: string[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const id = toIdentifier(row[column]);
    if (id != null) identifiers.push(id);
  }
  return identifiers;
};

export const readIdentifiers = async (filePath: string, column = "id"): Promise<string[]> =>
  parseIdentifiers(await readFile(filePath, "utf-8"), column);

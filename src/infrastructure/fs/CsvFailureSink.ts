import { appendFile, mkdir, readFile, stat } from "fs/promises";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { FailureRecord } from "../../core/fetch/fetchOutcome";
import type { FailureSink } from "../../ports/FailureSink";
import { isMissingFileError } from "./fsErrors";

const columns = ["id", "error"];

/**
 * Append-only `id,error` CSV. The header is written only while the file is
 * missing or empty; rows are never deduplicated.
 */
export class CsvFailureSink implements FailureSink {
  constructor(private readonly filePath: string) {}

  private async needsHeader(): Promise<boolean> {
    try {
      const info = await stat(this.filePath);
      return info.size === 0;
    } catch (err) {
      if (isMissingFileError(err)) return true;
      throw err;
    }
  }

  async flush(records: FailureRecord[]): Promise<void> {
    if (records.length === 0) return;

    await mkdir(path.dirname(this.filePath), { recursive: true });
    const header = await this.needsHeader();
    const csv = stringify(records, { header, columns });
    await appendFile(this.filePath, csv, "utf-8");
  }

  async countRecorded(): Promise<number> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFileError(err)) return 0;
      throw err;
    }
    if (content.trim() === "") return 0;

    const rows: unknown = parse(content, { columns: true, skip_empty_lines: true });
    return Array.isArray(rows) ? rows.length : 0;
  }
}

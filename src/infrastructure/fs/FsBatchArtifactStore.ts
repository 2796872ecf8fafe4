import { mkdir, readdir, rename, rm, writeFile } from "fs/promises";
import path from "path";
import type { ProductRecord } from "../../core/product/product.types";
import type { BatchArtifactStore } from "../../ports/BatchArtifactStore";
import { batchArtifactName, parseBatchIndex } from "../../core/batch/batchPlan";

export const defaultArtifactPrefix = "catalog_batch_";

/**
 * One JSON array file per completed batch. Writes go to `<name>.tmp` and are
 * renamed into place, so an artifact never exists half-written.
 */
export class FsBatchArtifactStore implements BatchArtifactStore {
  constructor(
    private readonly outputDir: string,
    private readonly prefix = defaultArtifactPrefix
  ) {}

  artifactPath(index: number): string {
    return path.join(this.outputDir, batchArtifactName(this.prefix, index));
  }

  async listCompletedBatches(): Promise<number[]> {
    await mkdir(this.outputDir, { recursive: true });
    const entries = await readdir(this.outputDir);

    const indices: number[] = [];
    for (const entry of entries) {
      const index = parseBatchIndex(this.prefix, entry);
      if (index != null) indices.push(index);
    }
    return indices.sort((a, b) => a - b);
  }

  async write(index: number, records: ProductRecord[]): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    const target = this.artifactPath(index);
    const tmp = `${target}.tmp`;

    try {
      await writeFile(tmp, JSON.stringify(records, null, 4), "utf-8");
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true }).catch(() => undefined);
      throw err;
    }
  }
}

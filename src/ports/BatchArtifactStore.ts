import type { ProductRecord } from "../core/product/product.types";

export interface BatchArtifactStore {
  /** Indices of batches whose artifact is fully persisted. */
  listCompletedBatches(): Promise<number[]>;
  write(index: number, records: ProductRecord[]): Promise<void>;
}

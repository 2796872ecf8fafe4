import type { BatchArtifactStore } from "../../ports/BatchArtifactStore";

/**
 * First batch without a persisted artifact: highest completed index + 1, or 1.
 */
export const resolveStartBatch = async (artifacts: BatchArtifactStore): Promise<number> => {
  const completed = await artifacts.listCompletedBatches();
  return completed.reduce((max, index) => Math.max(max, index), 0) + 1;
};

import { countBatches, sliceBatch } from "../../src/core/batch/batchPlan";

describe("batch plan", () => {
  const ids = ["a", "b", "c", "d", "e"];

  it("counts batches by ceiling division", () => {
    expect(countBatches(0, 2)).toBe(0);
    expect(countBatches(5, 2)).toBe(3);
    expect(countBatches(4, 2)).toBe(2);
  });

  it("slices batches by position with a short last batch", () => {
    expect(sliceBatch(ids, 1, 2)).toEqual({ index: 1, identifiers: ["a", "b"] });
    expect(sliceBatch(ids, 2, 2)).toEqual({ index: 2, identifiers: ["c", "d"] });
    expect(sliceBatch(ids, 3, 2)).toEqual({ index: 3, identifiers: ["e"] });
  });

  it("assigns every identifier to exactly one batch", () => {
    const seen = [1, 2, 3].flatMap((index) => sliceBatch(ids, index, 2).identifiers);
    expect(seen).toEqual(ids);
  });

  it("rejects indices below 1", () => {
    expect(() => sliceBatch(ids, 0, 2)).toThrow("batch index must be an integer >= 1. Received: 0");
  });
});

import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { FsBatchArtifactStore } from "../../src/infrastructure/fs/FsBatchArtifactStore";
import type { ProductRecord } from "../../src/core/product/product.types";

const record = (id: number): ProductRecord => ({
  id,
  name: `Sản phẩm ${id}`,
  url_key: `san-pham-${id}`,
  price: 1000,
  description: "Mô tả",
  image_url: null
});

describe("FsBatchArtifactStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "catalog-artifacts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the output directory and reports no completed batches", async () => {
    const store = new FsBatchArtifactStore(path.join(dir, "nested", "out"));
    await expect(store.listCompletedBatches()).resolves.toEqual([]);
  });

  it("writes pretty JSON without escaping non-ASCII text and leaves no temp file", async () => {
    const store = new FsBatchArtifactStore(dir);
    await store.write(2, [record(1)]);

    const content = await readFile(path.join(dir, "catalog_batch_2.json"), "utf-8");
    expect(content).toBe(JSON.stringify([record(1)], null, 4));
    expect(content).toContain("Sản phẩm 1");
    expect(await readdir(dir)).toEqual(["catalog_batch_2.json"]);
  });

  it("writes an empty array for a batch without successes", async () => {
    const store = new FsBatchArtifactStore(dir);
    await store.write(1, []);

    await expect(readFile(path.join(dir, "catalog_batch_1.json"), "utf-8")).resolves.toBe("[]");
  });

  it("lists only artifacts of its prefix, sorted by index", async () => {
    const store = new FsBatchArtifactStore(dir);
    await store.write(10, []);
    await store.write(2, []);
    await writeFile(path.join(dir, "catalog_batch_3.json.tmp"), "[");
    await writeFile(path.join(dir, "notes.txt"), "");
    await writeFile(path.join(dir, "other_batch_4.json"), "[]");

    await expect(store.listCompletedBatches()).resolves.toEqual([2, 10]);
  });

  it("supports a custom artifact prefix", async () => {
    const store = new FsBatchArtifactStore(dir, "tiki_batch_");
    await store.write(1, []);

    expect(store.artifactPath(1)).toBe(path.join(dir, "tiki_batch_1.json"));
    await expect(store.listCompletedBatches()).resolves.toEqual([1]);
  });
});

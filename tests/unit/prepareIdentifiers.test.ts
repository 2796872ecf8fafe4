import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import {
  chunkFileName,
  chunkIdentifiers,
  dedupeIdentifiers,
  prepareIdentifiers
} from "../../src/application/prepare-identifiers/prepareIdentifiers.usecase";

describe("identifier preparation", () => {
  it("removes duplicates keeping the first occurrence", () => {
    expect(dedupeIdentifiers(["3", "1", "3", "2", "1"])).toEqual(["3", "1", "2"]);
  });

  it("splits identifiers into fixed-size chunks", () => {
    expect(chunkIdentifiers(["a", "b", "c", "d", "e"], 2)).toEqual([["a", "b"], ["c", "d"], ["e"]]);
    expect(chunkIdentifiers([], 2)).toEqual([]);
    expect(() => chunkIdentifiers(["a"], 0)).toThrow("chunkSize must be an integer >= 1");
  });

  it("names chunk files by 1-based part number", () => {
    expect(chunkFileName("id", 3)).toBe("id_part_3.csv");
  });

  describe("prepareIdentifiers", () => {
    let dir: string;
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "catalog-prepare-"));
      logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
      warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(async () => {
      logSpy.mockRestore();
      warnSpy.mockRestore();
      await rm(dir, { recursive: true, force: true });
    });

    it("writes deduplicated chunk files with an id header", async () => {
      const inputFile = path.join(dir, "ids.csv");
      await writeFile(inputFile, "id\n1\n2\n\n2\n3\n 1 \n4\n");
      const outputDir = path.join(dir, "parts");

      const summary = await prepareIdentifiers({ inputFile, outputDir, prefix: "id", chunkSize: 3 });

      expect(summary).toEqual({
        before: 6,
        after: 4,
        duplicates: 2,
        files: [path.join(outputDir, "id_part_1.csv"), path.join(outputDir, "id_part_2.csv")]
      });
      await expect(readFile(path.join(outputDir, "id_part_1.csv"), "utf-8")).resolves.toBe("id\n1\n2\n3\n");
      await expect(readFile(path.join(outputDir, "id_part_2.csv"), "utf-8")).resolves.toBe("id\n4\n");
      expect(warnSpy).toHaveBeenCalledWith(JSON.stringify({ event: "prepare.duplicates_removed", duplicates: 2 }));
    });
  });
});

describe("composition root", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const mockCollaborators = () => {
    const client = {};
    const artifacts = {};
    const failures = {};
    const summary = { successes: 2 };
    const crawlProducts = jest.fn().mockResolvedValue(summary);
    const readIdentifiers = jest.fn().mockResolvedValue(["1", "2"]);
    const httpCtor = jest.fn().mockImplementation(() => client);
    const artifactCtor = jest.fn().mockImplementation(() => artifacts);
    const sinkCtor = jest.fn().mockImplementation(() => failures);

    jest.doMock("../../src/application/crawl-products/crawlProducts.usecase", () => ({ crawlProducts }));
    jest.doMock("../../src/infrastructure/csv/readIdentifiers", () => ({ readIdentifiers }));
    jest.doMock("../../src/infrastructure/catalog/CatalogHttpClient", () => ({ CatalogHttpClient: httpCtor }));
    jest.doMock("../../src/infrastructure/fs/FsBatchArtifactStore", () => ({ FsBatchArtifactStore: artifactCtor }));
    jest.doMock("../../src/infrastructure/fs/CsvFailureSink", () => ({ CsvFailureSink: sinkCtor }));

    return { client, artifacts, failures, summary, crawlProducts, readIdentifiers, httpCtor, artifactCtor, sinkCtor };
  };

  it("wires dependencies from defaults", async () => {
    process.env = {};
    const mocks = mockCollaborators();

    const { runCrawl } = await import("../../src/composition/root");
    const { defaultCrawlerConfig } = await import("../../src/application/crawl-products/crawler.config");
    await expect(runCrawl()).resolves.toBe(mocks.summary);

    expect(mocks.httpCtor).toHaveBeenCalledWith("https://api.tiki.vn/product-detail/api/v1/products", 10000);
    expect(mocks.artifactCtor).toHaveBeenCalledWith("catalog_batches");
    expect(mocks.sinkCtor).toHaveBeenCalledWith("failed_ids.csv");
    expect(mocks.readIdentifiers).toHaveBeenCalledWith("API_ids/id_part_1.csv", "id");
    expect(mocks.crawlProducts).toHaveBeenCalledWith({
      client: mocks.client,
      artifacts: mocks.artifacts,
      failures: mocks.failures,
      identifiers: ["1", "2"],
      config: defaultCrawlerConfig
    });
  });

  it("applies crawler, timeout and path overrides from env", async () => {
    process.env = {
      CATALOG_BASE_URL: "http://localhost:3999/products",
      CATALOG_TIMEOUT_MS: "1200",
      CRAWL_CONCURRENCY: "8",
      CRAWL_BATCH_SIZE: "50",
      CRAWL_INPUT_FILE: "ids.csv",
      CRAWL_ID_COLUMN: "product_id",
      CRAWL_OUTPUT_DIR: "out",
      CRAWL_FAILED_FILE: "out/failed.csv"
    };
    const mocks = mockCollaborators();

    const { runCrawl } = await import("../../src/composition/root");
    await runCrawl();

    expect(mocks.httpCtor).toHaveBeenCalledWith("http://localhost:3999/products", 1200);
    expect(mocks.artifactCtor).toHaveBeenCalledWith("out");
    expect(mocks.sinkCtor).toHaveBeenCalledWith("out/failed.csv");
    expect(mocks.readIdentifiers).toHaveBeenCalledWith("ids.csv", "product_id");
    expect(mocks.crawlProducts).toHaveBeenCalledWith(expect.objectContaining({
      config: expect.objectContaining({ concurrency: 8, batchSize: 50 })
    }));
  });

  it("fails before any I/O when env config is invalid", async () => {
    process.env = { CRAWL_MAX_RETRIES: "0" };
    const mocks = mockCollaborators();

    const { runCrawl } = await import("../../src/composition/root");
    await expect(runCrawl()).rejects.toThrow("CRAWL_MAX_RETRIES=0 is out of allowed range [1..20]");
    expect(mocks.readIdentifiers).not.toHaveBeenCalled();
  });

  it("runs identifier preparation with env config", async () => {
    process.env = { PREPARE_INPUT_FILE: "all.csv", PREPARE_CHUNK_SIZE: "100" };
    const prepareIdentifiers = jest.fn().mockResolvedValue({ before: 0, after: 0, duplicates: 0, files: [] });
    jest.doMock("../../src/application/prepare-identifiers/prepareIdentifiers.usecase", () => ({ prepareIdentifiers }));

    const { runPrepareIdentifiers } = await import("../../src/composition/root");
    await runPrepareIdentifiers();

    expect(prepareIdentifiers).toHaveBeenCalledWith({
      inputFile: "all.csv",
      outputDir: "API_ids",
      prefix: "id",
      chunkSize: 100
    });
  });
});

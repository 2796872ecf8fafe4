import http from "http";
import { URL } from "url";

/**
 * Minimal fake catalog API for local runs and E2E.
 * - GET /products/:id returns a deterministic product payload
 *
 * Per-identifier behaviour can be scripted: ids answered with 404, ids that
 * get a number of 429 responses before succeeding, ids pinned to a status.
 */
export type FakeCatalogOptions = {
  notFound?: string[];
  rateLimited?: Record<string, number>;
  statuses?: Record<string, number>;
};

export type FakeCatalogStats = {
  requests: number;
  requestsById: Map<string, number>;
};

export const makeProduct = (id: string) => ({
  id: /^\d+$/.test(id) ? Number(id) : id,
  name: `Product ${id}`,
  url_key: `product-${id}`,
  price: 1000 * (id.length + 1),
  description: `<p>Product <b>${id}</b></p><p>In stock</p>`,
  thumbnail_url: `https://img.example.test/${id}.jpg`
});

export const createFakeCatalogServer = (options: FakeCatalogOptions = {}) => {
  const notFound = new Set(options.notFound ?? []);
  const rateLimitedSent = new Map<string, number>();
  const stats: FakeCatalogStats = { requests: 0, requestsById: new Map() };

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const match = /^\/products\/([^/]+)$/.exec(url.pathname);
    if (!match) {
      res.writeHead(404);
      return res.end();
    }

    const id = decodeURIComponent(match[1]);
    stats.requests += 1;
    stats.requestsById.set(id, (stats.requestsById.get(id) ?? 0) + 1);

    const pinned = options.statuses?.[id];
    if (pinned != null) {
      res.writeHead(pinned, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "pinned_status" }));
    }

    if (notFound.has(id)) {
      res.writeHead(404, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "not_found" }));
    }

    const limit = options.rateLimited?.[id] ?? 0;
    const sent = rateLimitedSent.get(id) ?? 0;
    if (sent < limit) {
      rateLimitedSent.set(id, sent + 1);
      res.writeHead(429, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "rate_limited" }));
    }

    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify(makeProduct(id)));
  });

  return { server, stats };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_CATALOG_PORT ?? 3999);
  const { server } = createFakeCatalogServer({ notFound: ["404"], rateLimited: { "429": 1 } });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake catalog server on http://localhost:${port}/products`);
  });
}

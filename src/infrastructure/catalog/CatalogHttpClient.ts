import { CatalogTimeoutError, type CatalogClient, type CatalogResponse } from "../../ports/CatalogClient";

export const defaultCatalogHeaders: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  Accept: "application/json, text/plain, */*"
};

/**
 * Catalog product client using native fetch (Node 20).
 * Issues exactly one `GET <baseUrl>/<id>` per call.
 */
export class CatalogHttpClient implements CatalogClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10000,
    private readonly headers: Record<string, string> = defaultCatalogHeaders
  ) {}

  productUrl(id: string): URL {
    const url = new URL(this.baseUrl);
    const segment = encodeURIComponent(id);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${segment}` : `${url.pathname}/${segment}`;
    return url;
  }

  async getProduct(id: string): Promise<CatalogResponse> {
    const url = this.productUrl(id);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(url.toString(), {
        headers: this.headers,
        signal: controller.signal
      });

      if (res.status !== 200) {
        await res.text().catch(() => "");
        return { status: res.status, payload: undefined };
      }

      const payload: unknown = await res.json();
      return { status: res.status, payload };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new CatalogTimeoutError(this.timeoutMs, safeRequestUrl);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }
}

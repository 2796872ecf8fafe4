export type CatalogResponse = {
  status: number;
  payload: unknown; // parsed JSON body for 200 responses, undefined otherwise
};

export class CatalogTimeoutError extends Error {
  readonly isTimeout = true;

  constructor(readonly timeoutMs: number, readonly requestUrl: string) {
    super(`Catalog request timeout after ${timeoutMs}ms`);
    this.name = "CatalogTimeoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * One request per call; retries are the caller's concern.
 * Rejects with `CatalogTimeoutError` when the request exceeds its timeout.
 */
export interface CatalogClient {
  getProduct(id: string): Promise<CatalogResponse>;
}

import type { ProductRecord } from "../product/product.types";

export type FailureReason =
  | { kind: "not_found" }
  | { kind: "http_status"; status: number }
  | { kind: "timeout_exhausted" }
  | { kind: "rate_limited_exhausted" }
  | { kind: "exception"; message: string }
  | { kind: "retries_exhausted" };

export type FetchSuccess = {
  kind: "success";
  id: string;
  record: ProductRecord;
};

export type FetchFailure = {
  kind: "failure";
  id: string;
  reason: FailureReason;
};

export type FetchOutcome = FetchSuccess | FetchFailure;

/** Row of the failure log. */
export type FailureRecord = {
  id: string;
  error: string;
};

/**
 * Value written to the `error` column of the failure log.
 */
export const failureErrorCode = (reason: FailureReason): string => {
  switch (reason.kind) {
    case "not_found":
      return "404";
    case "http_status":
      return String(reason.status);
    case "rate_limited_exhausted":
      return "429";
    case "timeout_exhausted":
      return "Timeout";
    case "exception":
      return "Exception";
    case "retries_exhausted":
      return "Failed";
  }
};

export const toFailureRecord = (failure: FetchFailure): FailureRecord => ({
  id: failure.id,
  error: failureErrorCode(failure.reason)
});

export const success = (id: string, record: ProductRecord): FetchSuccess => ({ kind: "success", id, record });

export const failure = (id: string, reason: FailureReason): FetchFailure => ({ kind: "failure", id, reason });

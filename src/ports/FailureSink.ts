import type { FailureRecord } from "../core/fetch/fetchOutcome";

export interface FailureSink {
  flush(records: FailureRecord[]): Promise<void>;
  countRecorded(): Promise<number>;
}

import { ReviewRecord } from "../types";

export interface LoadResult {
  records: ReviewRecord[];
  skipped: number;
}

/** Where a transform reads its batch from and writes it back to. */
export interface ReviewStore {
  describe(): string;
  load(): LoadResult;
  /**
   * Persist `records`, the batch returned by load() after transformation
   * (same length, same order). Returns the number of rows written.
   */
  commit(records: ReviewRecord[]): number;
}

import { RawReview, RawReviewPage, ReviewRecord } from "../types";

export interface FetchPagesOptions {
  pageSize?: number;
  startPage?: number;
  delayMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

/** A remote review platform, read one page at a time. */
export interface ReviewSourceModule {
  name: string;
  baseUrl: string;
  /**
   * Lazily yields pages starting at `startPage` until the source runs dry.
   * Throws SourceUnavailableError once a page exhausts its retries.
   */
  fetchPages(productId: string, options?: FetchPagesOptions): AsyncGenerator<RawReviewPage>;
  normalize(raw: RawReview): ReviewRecord;
}

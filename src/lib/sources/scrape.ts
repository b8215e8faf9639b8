import { MalformedRecordError, SourceUnavailableError } from "../errors";
import { ReviewRecord } from "../types";
import { FetchPagesOptions, ReviewSourceModule } from "./types";

export interface ScrapeOptions extends FetchPagesOptions {
  /** Stop after this many records; 0 = no limit. */
  limit?: number;
}

export interface ScrapeResult {
  records: ReviewRecord[];
  skipped: number;
  duplicates: number;
  pages: number;
  /** Set when a page exhausted its retries; `records` holds what came before it. */
  failure?: SourceUnavailableError;
}

/**
 * Drain a source for one product: normalize every payload, skip and count
 * malformed ones, and keep the first record seen for each sourceId. A page
 * that stays unavailable ends the scrape early with `failure` set.
 */
export async function scrapeReviews(
  source: ReviewSourceModule,
  productId: string,
  options: ScrapeOptions = {}
): Promise<ScrapeResult> {
  const { limit = 0, ...fetchOptions } = options;
  const result: ScrapeResult = { records: [], skipped: 0, duplicates: 0, pages: 0 };

  try {
    await collectPages(source, productId, fetchOptions, limit, result);
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;
    console.error(`[${source.name}] ${err.message}; resume with startPage ${err.page}`);
    result.failure = err;
  }

  return result;
}

async function collectPages(
  source: ReviewSourceModule,
  productId: string,
  fetchOptions: FetchPagesOptions,
  limit: number,
  result: ScrapeResult
): Promise<void> {
  const seen = new Set<string>();

  for await (const page of source.fetchPages(productId, fetchOptions)) {
    result.pages++;

    for (const raw of page.reviews) {
      let record: ReviewRecord;
      try {
        record = source.normalize(raw);
      } catch (err) {
        if (!(err instanceof MalformedRecordError)) throw err;
        result.skipped++;
        console.warn(`[${source.name}] skipped review on page ${page.page}: ${err.message}`);
        continue;
      }

      if (seen.has(record.sourceId)) {
        result.duplicates++;
        continue;
      }
      seen.add(record.sourceId);
      result.records.push(record);

      if (limit > 0 && result.records.length >= limit) {
        return;
      }
    }
  }
}

import { config } from "../config";
import { SourceUnavailableError } from "../errors";
import { normalizeAliExpressReview } from "../normalization";
import { fetchJson, delay } from "../scraping/utils";
import { RawReview, RawReviewPage } from "../types";
import { FetchPagesOptions, ReviewSourceModule } from "./types";

const ALIEXPRESS_FEEDBACK_URL = "https://feedback.aliexpress.com";

export function buildFeedbackUrl(productId: string, page: number, pageSize: number): string {
  const params = new URLSearchParams({
    productId,
    page: String(page),
    pageSize: String(pageSize),
    filter: "all",
  });
  return `${ALIEXPRESS_FEEDBACK_URL}/pc/searchEvaluation.do?${params.toString()}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pull the review list (data.evaViewList) and page count out of a response body. */
export function parseFeedbackResponse(body: unknown): { reviews: RawReview[]; totalPages?: number } {
  const data: Record<string, unknown> = isRecord(body) && isRecord(body.data) ? body.data : {};
  const list = Array.isArray(data.evaViewList) ? data.evaViewList : [];
  const reviews = list.filter(isRecord);
  const totalPage = Number(data.totalPage);
  return {
    reviews,
    totalPages: Number.isFinite(totalPage) && totalPage > 0 ? totalPage : undefined,
  };
}

async function* fetchPages(
  productId: string,
  options: FetchPagesOptions = {}
): AsyncGenerator<RawReviewPage> {
  const {
    pageSize = config.reviewPageSize,
    startPage = 1,
    delayMs = config.scrapeDelayMs,
    retries,
    retryDelayMs,
  } = options;

  for (let page = startPage; ; page++) {
    if (page > startPage) {
      await delay(delayMs);
    }

    let body: unknown;
    try {
      body = await fetchJson(buildFeedbackUrl(productId, page, pageSize), { retries, retryDelayMs });
    } catch (err) {
      throw new SourceUnavailableError("aliexpress", page, err);
    }

    const { reviews, totalPages } = parseFeedbackResponse(body);
    if (reviews.length === 0) {
      console.log(`[aliexpress] page ${page} empty, done`);
      return;
    }

    console.log(`[aliexpress] page ${page}: ${reviews.length} reviews`);
    yield { page, reviews, totalPages };

    if (totalPages !== undefined && page >= totalPages) return;
  }
}

export const aliexpress: ReviewSourceModule = {
  name: "aliexpress",
  baseUrl: ALIEXPRESS_FEEDBACK_URL,
  fetchPages,
  normalize: normalizeAliExpressReview,
};

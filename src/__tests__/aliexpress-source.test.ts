import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../lib/scraping/utils", () => ({
  fetchJson: vi.fn(),
  delay: vi.fn(() => Promise.resolve()),
}));

import { aliexpress, buildFeedbackUrl, parseFeedbackResponse } from "../lib/sources/aliexpress";
import { scrapeReviews } from "../lib/sources/scrape";
import { fetchJson } from "../lib/scraping/utils";
import { SourceUnavailableError } from "../lib/errors";

const mockFetchJson = fetchJson as ReturnType<typeof vi.fn>;

function makeReviews(count: number, firstId: number) {
  return Array.from({ length: count }, (_, i) => ({
    evaluationId: firstId + i,
    buyerName: `Buyer ${firstId + i}`,
    buyerEval: 100,
    buyerFeedback: "ok",
    gmtCreate: 1704067200000,
  }));
}

function page(reviews: unknown[], totalPage?: number) {
  return { data: { evaViewList: reviews, ...(totalPage ? { totalPage } : {}) } };
}

describe("aliexpress source", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("builds the feedback URL", () => {
    expect(buildFeedbackUrl("1005007002128983", 2, 20)).toBe(
      "https://feedback.aliexpress.com/pc/searchEvaluation.do?productId=1005007002128983&page=2&pageSize=20&filter=all"
    );
  });

  it("tolerates responses without a review list", () => {
    expect(parseFeedbackResponse({ data: {} })).toEqual({ reviews: [], totalPages: undefined });
    expect(parseFeedbackResponse("nope")).toEqual({ reviews: [], totalPages: undefined });
  });

  it("yields 40 records from pages of 20, 20 and 0 without a fourth fetch", async () => {
    mockFetchJson
      .mockResolvedValueOnce(page(makeReviews(20, 1)))
      .mockResolvedValueOnce(page(makeReviews(20, 21)))
      .mockResolvedValueOnce(page([]));

    const result = await scrapeReviews(aliexpress, "42", { pageSize: 20 });

    expect(result.records).toHaveLength(40);
    expect(result.pages).toBe(2);
    expect(result.skipped).toBe(0);
    expect(mockFetchJson).toHaveBeenCalledTimes(3);
  });

  it("stops at the reported last page", async () => {
    mockFetchJson.mockResolvedValueOnce(page(makeReviews(5, 1), 1));

    const result = await scrapeReviews(aliexpress, "42");

    expect(result.records).toHaveLength(5);
    expect(mockFetchJson).toHaveBeenCalledTimes(1);
  });

  it("counts malformed and duplicate reviews without failing the batch", async () => {
    const reviews = [
      ...makeReviews(2, 1),
      { evaluationId: 3, buyerEval: 100 }, // no date
      ...makeReviews(1, 1),
    ];
    mockFetchJson.mockResolvedValueOnce(page(reviews)).mockResolvedValueOnce(page([]));

    const result = await scrapeReviews(aliexpress, "42");

    expect(result.records.map((r) => r.sourceId)).toEqual(["1", "2"]);
    expect(result.skipped).toBe(1);
    expect(result.duplicates).toBe(1);
  });

  it("stops once the limit is reached", async () => {
    mockFetchJson.mockResolvedValueOnce(page(makeReviews(20, 1)));

    const result = await scrapeReviews(aliexpress, "42", { limit: 5 });

    expect(result.records).toHaveLength(5);
    expect(mockFetchJson).toHaveBeenCalledTimes(1);
  });

  it("keeps earlier pages and reports the page to resume from when a page keeps failing", async () => {
    mockFetchJson
      .mockResolvedValueOnce(page(makeReviews(20, 1)))
      .mockRejectedValueOnce(new Error("HTTP 503"));

    const result = await scrapeReviews(aliexpress, "42");

    expect(result.failure).toBeInstanceOf(SourceUnavailableError);
    expect(result.failure?.page).toBe(2);
    expect(result.records).toHaveLength(20);
    expect(result.pages).toBe(1);
  });

  it("starts from startPage when resuming", async () => {
    mockFetchJson.mockResolvedValueOnce(page([]));

    await scrapeReviews(aliexpress, "42", { startPage: 3, pageSize: 20 });

    expect(mockFetchJson).toHaveBeenCalledWith(
      buildFeedbackUrl("42", 3, 20),
      expect.any(Object)
    );
  });
});

import { describe, it, expect } from "vitest";
import {
  cleanReviewText,
  normalizeAliExpressReview,
  parseRating,
  PLACEHOLDER_AUTHOR,
} from "../lib/normalization";
import { MalformedRecordError } from "../lib/errors";

function makeRaw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    evaluationId: 8100001,
    buyerName: "J***n",
    buyerEval: 80,
    buyerFeedback: "Works fine",
    gmtCreate: 1704067200000, // 2024-01-01T00:00:00Z
    ...overrides,
  };
}

describe("normalizeAliExpressReview", () => {
  it("maps a full payload to a canonical record", () => {
    expect(normalizeAliExpressReview(makeRaw())).toEqual({
      author: "J***n",
      rating: 4,
      body: "Works fine",
      date: "2024-01-01T00:00:00.000Z",
      verified: true,
      sourceId: "8100001",
    });
  });

  it("falls back to the placeholder author when the buyer is anonymous", () => {
    const record = normalizeAliExpressReview(makeRaw({ buyerName: "" }));
    expect(record.author).toBe(PLACEHOLDER_AUTHOR);
  });

  it("reads the timestamp from alternate keys", () => {
    const record = normalizeAliExpressReview(
      makeRaw({ gmtCreate: undefined, feedbackCreateTime: 1704153600000 })
    );
    expect(record.date).toBe("2024-01-02T00:00:00.000Z");
  });

  it("parses evalDate when no timestamp is present", () => {
    const record = normalizeAliExpressReview(
      makeRaw({ gmtCreate: undefined, evalDate: "2024-03-05T00:00:00Z" })
    );
    expect(record.date).toBe("2024-03-05T00:00:00.000Z");
  });

  it("honours an explicit verified flag", () => {
    expect(normalizeAliExpressReview(makeRaw({ verified: false })).verified).toBe(false);
  });

  it("rejects a payload without an id", () => {
    expect(() => normalizeAliExpressReview(makeRaw({ evaluationId: undefined }))).toThrow(
      MalformedRecordError
    );
  });

  it("keeps adjacent 17-digit ids apart by reading the string id", () => {
    const first = normalizeAliExpressReview(
      makeRaw({ evaluationId: Number("60044409431431529"), evaluationIdStr: "60044409431431529" })
    );
    const second = normalizeAliExpressReview(
      makeRaw({ evaluationId: Number("60044409431431531"), evaluationIdStr: "60044409431431531" })
    );
    expect(first.sourceId).toBe("60044409431431529");
    expect(second.sourceId).toBe("60044409431431531");
  });

  it("rejects a numeric id too large to be exact", () => {
    try {
      normalizeAliExpressReview(makeRaw({ evaluationId: Number("60044409431431531") }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRecordError);
      expect((err as MalformedRecordError).field).toBe("sourceId");
    }
  });

  it("rejects a payload without a date", () => {
    try {
      normalizeAliExpressReview(makeRaw({ gmtCreate: undefined }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRecordError);
      expect((err as MalformedRecordError).field).toBe("date");
    }
  });
});

describe("parseRating", () => {
  it("converts the 0-100 scale to stars", () => {
    expect(parseRating(100)).toBe(5);
    expect(parseRating(20)).toBe(1);
    expect(parseRating("60")).toBe(3);
  });

  it("rejects missing and out-of-range values", () => {
    expect(() => parseRating(undefined)).toThrow(MalformedRecordError);
    expect(() => parseRating(0)).toThrow(/out of range/);
    expect(() => parseRating(140)).toThrow(/out of range/);
  });
});

describe("cleanReviewText", () => {
  it("turns <br> into newlines and decodes entities", () => {
    expect(cleanReviewText("Great &amp; cheap<br>works")).toBe("Great & cheap\nworks");
  });

  it("returns an empty string for empty input", () => {
    expect(cleanReviewText("")).toBe("");
  });
});

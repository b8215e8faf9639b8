import * as cheerio from "cheerio";
import { MalformedRecordError } from "./errors";
import { MAX_RATING, MIN_RATING, RawReview, ReviewRecord } from "./types";

/** Name the platform shows for shoppers who hide their identity. */
export const PLACEHOLDER_AUTHOR = "AliExpress Shopper";

// Field names drift between API versions; first non-empty wins.
const TIMESTAMP_KEYS = [
  "gmtCreate",
  "createTime",
  "createTimestamp",
  "gmtOrderCreateTime",
  "feedbackCreateTime",
];

// The string form comes first: numeric ids are past 2^53 and arrive rounded
const SOURCE_ID_KEYS = ["evaluationIdStr", "evaluationId", "id"];

function firstPresent(raw: RawReview, keys: string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

function asText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Strip markup from review text: `<br>` becomes a newline and entities are
 * decoded.
 */
export function cleanReviewText(raw: string): string {
  if (!raw) return "";
  const $ = cheerio.load(raw, null, false);
  $("br").replaceWith("\n");
  return $.root()
    .text()
    .replace(/[\u200b\u200c\u200d\ufeff]/g, "")
    .replace(/[ \t]+\n/g, "\n")
    .trim();
}

/** buyerEval is on a 0-100 scale (100 = five stars). */
export function parseRating(value: unknown): number {
  const num = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof num !== "number" || !Number.isFinite(num)) {
    throw new MalformedRecordError("rating", "is missing or not a number");
  }
  const stars = Math.round(num / 20);
  if (stars < MIN_RATING || stars > MAX_RATING) {
    throw new MalformedRecordError("rating", `out of range (${num})`);
  }
  return stars;
}

export function parseReviewDate(raw: RawReview): string {
  const ts = firstPresent(raw, TIMESTAMP_KEYS);
  if (ts !== undefined) {
    const ms = Number(ts);
    if (Number.isFinite(ms) && ms > 0) {
      return new Date(ms).toISOString();
    }
  }

  const evalDate = asText(raw.evalDate);
  if (evalDate) {
    const parsed = Date.parse(evalDate);
    if (!isNaN(parsed)) return new Date(parsed).toISOString();
  }

  throw new MalformedRecordError("date", "is missing or unparseable");
}

export function parseSourceId(raw: RawReview): string {
  const value = firstPresent(raw, SOURCE_ID_KEYS);
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new MalformedRecordError("sourceId", `lost precision as a number (${value})`);
    }
    return String(value);
  }
  throw new MalformedRecordError("sourceId", "is missing");
}

export function normalizeAliExpressReview(raw: RawReview): ReviewRecord {
  const sourceId = parseSourceId(raw);

  const rating = parseRating(raw.buyerEval);
  const date = parseReviewDate(raw);
  const author = asText(raw.buyerName)?.trim() || PLACEHOLDER_AUTHOR;
  const body = cleanReviewText(asText(raw.buyerFeedback) ?? "");
  const verified = typeof raw.verified === "boolean" ? raw.verified : true;

  return { author, rating, body, date, verified, sourceId };
}

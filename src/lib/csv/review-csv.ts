import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { MalformedRecordError, SchemaMismatchError } from "../errors";
import { MAX_RATING, MIN_RATING, ReviewRecord } from "../types";

/** Column order is part of the file format; do not reorder. */
export const CSV_COLUMNS = ["author", "rating", "body", "date", "verified", "source_id"] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

export interface CsvReadResult {
  records: ReviewRecord[];
  skipped: number;
}

function toRow(record: ReviewRecord): string[] {
  return [
    record.author,
    String(record.rating),
    record.body,
    record.date,
    record.verified ? "true" : "false",
    record.sourceId,
  ];
}

export function formatReviewsCsv(records: ReviewRecord[]): string {
  return stringify([[...CSV_COLUMNS], ...records.map(toRow)]);
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === "string");
}

function parseCsvRating(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new MalformedRecordError("rating", `is not an integer ("${value}")`);
  }
  const rating = parseInt(trimmed, 10);
  if (rating < MIN_RATING || rating > MAX_RATING) {
    throw new MalformedRecordError("rating", `out of range (${rating})`);
  }
  return rating;
}

function parseCsvBoolean(value: string): boolean {
  const lower = value.trim().toLowerCase();
  if (lower === "true" || lower === "1") return true;
  if (lower === "false" || lower === "0" || lower === "") return false;
  throw new MalformedRecordError("verified", `is not a boolean ("${value}")`);
}

function rowToRecord(row: string[], index: Record<CsvColumn, number>): ReviewRecord {
  const cell = (col: CsvColumn) => row[index[col]] ?? "";

  const sourceId = cell("source_id").trim();
  if (!sourceId) throw new MalformedRecordError("source_id", "is empty");
  const date = cell("date").trim();
  if (!date) throw new MalformedRecordError("date", "is empty");

  return {
    author: cell("author"),
    rating: parseCsvRating(cell("rating")),
    body: cell("body"),
    date,
    verified: parseCsvBoolean(cell("verified")),
    sourceId,
  };
}

/**
 * Parse review CSV text. Missing columns fail the whole file; rows with bad
 * values are skipped and counted.
 */
export function parseReviewsCsv(text: string): CsvReadResult {
  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const rows = Array.isArray(parsed) ? parsed.filter(isStringRow) : [];

  const header = (rows[0] ?? []).map((h) => h.trim());
  const missing = CSV_COLUMNS.filter((col) => !header.includes(col));
  if (missing.length > 0) {
    throw new SchemaMismatchError("CSV header", missing);
  }

  const index = {
    author: header.indexOf("author"),
    rating: header.indexOf("rating"),
    body: header.indexOf("body"),
    date: header.indexOf("date"),
    verified: header.indexOf("verified"),
    source_id: header.indexOf("source_id"),
  };

  const result: CsvReadResult = { records: [], skipped: 0 };
  rows.slice(1).forEach((row, i) => {
    try {
      result.records.push(rowToRecord(row, index));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      result.skipped++;
      console.warn(`[csv] skipped row ${i + 2}: ${err.message}`);
    }
  });

  return result;
}

export function readReviewsCsv(csvPath: string): CsvReadResult {
  const text = fs.readFileSync(path.resolve(process.cwd(), csvPath), "utf-8");
  return parseReviewsCsv(text);
}

/** Write records to `csvPath`, creating parent directories. Returns the absolute path. */
export function writeReviewsCsv(csvPath: string, records: ReviewRecord[]): string {
  const outPath = path.resolve(process.cwd(), csvPath);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, formatReviewsCsv(records), "utf-8");
  return outPath;
}

/**
 * Add records to an existing review CSV (or start one), leaving out sourceIds
 * the file already holds.
 */
export function appendReviewsCsv(
  csvPath: string,
  records: ReviewRecord[]
): { path: string; added: number } {
  const outPath = path.resolve(process.cwd(), csvPath);
  const existing = fs.existsSync(outPath) ? readReviewsCsv(outPath).records : [];
  const known = new Set(existing.map((r) => r.sourceId));
  const added = records.filter((r) => !known.has(r.sourceId));
  return { path: writeReviewsCsv(outPath, [...existing, ...added]), added: added.length };
}

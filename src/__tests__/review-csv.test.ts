import { describe, it, expect, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  formatReviewsCsv,
  parseReviewsCsv,
  readReviewsCsv,
  writeReviewsCsv,
} from "../lib/csv/review-csv";
import { SchemaMismatchError } from "../lib/errors";
import type { ReviewRecord } from "../lib/types";

const HEADER = "author,rating,body,date,verified,source_id";

const records: ReviewRecord[] = [
  {
    author: "Ana Silva",
    rating: 5,
    body: 'Fast shipping, "as described"',
    date: "2024-01-01T00:00:00.000Z",
    verified: true,
    sourceId: "101",
  },
  {
    author: "Lee",
    rating: 2,
    body: "Broke after a week\nwould not buy again",
    date: "2024-02-10T08:30:00.000Z",
    verified: false,
    sourceId: "102",
  },
  {
    author: "AliExpress Shopper",
    rating: 4,
    body: "",
    date: "2024-03-01T12:00:00.000Z",
    verified: true,
    sourceId: "103",
  },
];

describe("formatReviewsCsv", () => {
  it("writes the fixed header and quotes fields that need it", () => {
    const lines = formatReviewsCsv(records.slice(0, 1)).split("\n");
    expect(lines[0]).toBe(HEADER);
    expect(lines[1]).toBe(
      'Ana Silva,5,"Fast shipping, ""as described""",2024-01-01T00:00:00.000Z,true,101'
    );
  });
});

describe("parseReviewsCsv", () => {
  it("reads back exactly what was written", () => {
    const csv = formatReviewsCsv(records);
    const result = parseReviewsCsv(csv);

    expect(result.records).toEqual(records);
    expect(result.skipped).toBe(0);
    expect(formatReviewsCsv(result.records)).toBe(csv);
  });

  it("accepts columns in any order and ignores extra ones", () => {
    const csv = [
      "source_id,country,verified,date,body,rating,author",
      "7,BR,1,2024-01-01,nice,3,Bo",
    ].join("\n");

    expect(parseReviewsCsv(csv).records).toEqual([
      { author: "Bo", rating: 3, body: "nice", date: "2024-01-01", verified: true, sourceId: "7" },
    ]);
  });

  it("fails when required columns are missing", () => {
    const csv = "author,rating,content,date\nBo,3,nice,2024-01-01\n";
    try {
      parseReviewsCsv(csv);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaMismatchError);
      expect((err as SchemaMismatchError).missing).toEqual(["body", "verified", "source_id"]);
    }
  });

  it("skips rows with invalid values and counts them", () => {
    const csv = [
      HEADER,
      "Bo,3,nice,2024-01-01,true,1",
      "Cy,9,bad rating,2024-01-01,true,2",
      "Di,4.5,fractional,2024-01-01,true,3",
      "Ed,4,no id,2024-01-01,true,",
    ].join("\n");

    const result = parseReviewsCsv(csv);
    expect(result.records.map((r) => r.sourceId)).toEqual(["1"]);
    expect(result.skipped).toBe(3);
  });
});

describe("readReviewsCsv / writeReviewsCsv", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "review-csv-"));

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates parent directories and round-trips through a file", () => {
    const file = path.join(dir, "nested", "reviews.csv");
    const written = writeReviewsCsv(file, records);

    expect(written).toBe(file);
    expect(readReviewsCsv(file).records).toEqual(records);
  });
});

import path from "path";
import { readReviewsCsv, writeReviewsCsv } from "../csv/review-csv";
import { ReviewRecord } from "../types";
import { LoadResult, ReviewStore } from "./types";

export class CsvReviewStore implements ReviewStore {
  constructor(
    private readonly csvPath: string,
    private readonly outfile: string = csvPath
  ) {}

  describe(): string {
    return path.resolve(process.cwd(), this.outfile);
  }

  load(): LoadResult {
    return readReviewsCsv(this.csvPath);
  }

  commit(records: ReviewRecord[]): number {
    const outPath = writeReviewsCsv(this.outfile, records);
    console.log(`[csv] wrote ${records.length} reviews to ${outPath}`);
    return records.length;
  }
}

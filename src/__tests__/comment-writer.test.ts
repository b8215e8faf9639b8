import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { importReviews } from "../lib/comments/writer";
import { ensureCommentTables } from "../lib/db";
import { InvalidParameterError } from "../lib/errors";
import type { ReviewRecord } from "../lib/types";

function makeRecord(sourceId: string, overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return {
    author: `Author ${sourceId}`,
    rating: 5,
    body: `Body ${sourceId}`,
    date: "2024-01-01T10:00:00.000Z",
    verified: true,
    sourceId,
    ...overrides,
  };
}

function count(db: Database.Database, table: string): number {
  return (db.prepare(`SELECT count(*) AS c FROM ${table}`).get() as { c: number }).c;
}

describe("importReviews", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("inserts one comment and three meta rows per review", () => {
    const summary = importReviews(db, [makeRecord("1"), makeRecord("2", { verified: false })], {
      prefix: "wp_",
      postId: 8348,
    });

    expect(summary).toEqual({
      inserted: 2,
      duplicates: 0,
      failed: 0,
      belowMinRating: 0,
      commentRows: 2,
      metaRows: 6,
    });

    const comment = db
      .prepare("SELECT * FROM wp_comments WHERE comment_author = ?")
      .get("Author 2") as Record<string, unknown>;
    expect(comment).toMatchObject({
      comment_post_ID: 8348,
      comment_date: "2024-01-01 10:00:00",
      comment_date_gmt: "2024-01-01 10:00:00",
      comment_content: "Body 2",
      comment_approved: "1",
    });

    const meta = db
      .prepare("SELECT meta_key, meta_value FROM wp_commentmeta WHERE comment_id = ? ORDER BY meta_id")
      .all(comment.comment_ID);
    expect(meta).toEqual([
      { meta_key: "rating", meta_value: "5" },
      { meta_key: "verified", meta_value: "0" },
      { meta_key: "source_id", meta_value: "2" },
    ]);
  });

  it("inserts nothing when re-run with the same reviews", () => {
    const records = [makeRecord("1"), makeRecord("2")];
    importReviews(db, records, { prefix: "wp_", postId: 1 });

    const again = importReviews(db, records, { prefix: "wp_", postId: 1 });

    expect(again.inserted).toBe(0);
    expect(again.duplicates).toBe(2);
    expect(count(db, "wp_comments")).toBe(2);
  });

  it("treats a repeated sourceId within one batch as a duplicate", () => {
    const summary = importReviews(db, [makeRecord("1"), makeRecord("1")], { prefix: "wp_", postId: 1 });
    expect(summary.inserted).toBe(1);
    expect(summary.duplicates).toBe(1);
  });

  it("keeps prefixes apart", () => {
    importReviews(db, [makeRecord("1")], { prefix: "wp_", postId: 1 });
    const summary = importReviews(db, [makeRecord("1")], { prefix: "wp2_", postId: 1 });
    expect(summary.inserted).toBe(1);
    expect(count(db, "wp2_comments")).toBe(1);
  });

  it("uses custom meta keys", () => {
    importReviews(db, [makeRecord("1")], {
      prefix: "wp_",
      postId: 1,
      metaKeys: { rating: "stars", verified: "verified_buyer", sourceId: "ali_id" },
    });
    const keys = db.prepare("SELECT meta_key FROM wp_commentmeta ORDER BY meta_id").all();
    expect(keys).toEqual([{ meta_key: "stars" }, { meta_key: "verified_buyer" }, { meta_key: "ali_id" }]);
  });

  it("skips reviews below minRating", () => {
    const summary = importReviews(db, [makeRecord("1", { rating: 2 }), makeRecord("2", { rating: 4 })], {
      prefix: "wp_",
      postId: 1,
      minRating: 3,
    });
    expect(summary.inserted).toBe(1);
    expect(summary.belowMinRating).toBe(1);
  });

  it("plans the same counts in dry-run without writing anything", () => {
    ensureCommentTables(db, "wp_");
    importReviews(db, [makeRecord("1")], { prefix: "wp_", postId: 1 });
    const records = [makeRecord("1"), makeRecord("2"), makeRecord("2"), makeRecord("3", { rating: 1 })];

    const planned = importReviews(db, records, { prefix: "wp_", postId: 1, minRating: 2, dryRun: true });
    expect(count(db, "wp_comments")).toBe(1);
    expect(count(db, "wp_commentmeta")).toBe(3);

    const actual = importReviews(db, records, { prefix: "wp_", postId: 1, minRating: 2 });
    expect(planned).toEqual(actual);
    expect(actual).toEqual({
      inserted: 1,
      duplicates: 2,
      failed: 0,
      belowMinRating: 1,
      commentRows: 1,
      metaRows: 3,
    });
  });

  it("plans against a database whose tables do not exist yet", () => {
    const planned = importReviews(db, [makeRecord("1")], { prefix: "wp_", postId: 1, dryRun: true });
    expect(planned.inserted).toBe(1);
    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table'").all();
    expect(tables).toEqual([]);
  });

  it("rolls back a failing review and carries on with the batch", () => {
    ensureCommentTables(db, "wp_");
    db.exec(`
      CREATE TRIGGER reject_meta BEFORE INSERT ON wp_commentmeta
      WHEN NEW.meta_value = 'bad-id'
      BEGIN SELECT RAISE(ABORT, 'rejected'); END;
    `);

    const summary = importReviews(db, [makeRecord("1"), makeRecord("bad-id"), makeRecord("3")], {
      prefix: "wp_",
      postId: 1,
    });

    expect(summary.inserted).toBe(2);
    expect(summary.failed).toBe(1);
    // no orphan comment left behind by the failed review
    expect(count(db, "wp_comments")).toBe(2);
    expect(count(db, "wp_commentmeta")).toBe(6);
  });

  it("rejects prefixes that are not plain identifiers", () => {
    expect(() => importReviews(db, [], { prefix: "wp; DROP TABLE x; --", postId: 1 })).toThrow(
      InvalidParameterError
    );
  });
});

import Database from "better-sqlite3";
import { commentTables, CommentTables, fromSqlDateTime, tableExists } from "../db";
import { SchemaMismatchError } from "../errors";
import { DEFAULT_META_KEYS, MAX_RATING, MetaKeys, MIN_RATING, ReviewRecord } from "../types";
import { LoadResult, ReviewStore } from "./types";

interface CommentRow {
  id: number;
  author: string;
  body: string;
  date: string;
  rating: string;
  verified: string | null;
  source_id: string | null;
}

export interface DbStoreOptions {
  prefix: string;
  metaKeys?: MetaKeys;
  /** Limit to one post's reviews; undefined = every post. */
  postId?: number;
}

/**
 * Reviews stored as comments. Only comments carrying a rating meta row in
 * range are reviews; plain comments are never loaded or touched.
 */
export class DbReviewStore implements ReviewStore {
  private readonly tables: CommentTables;
  private readonly metaKeys: MetaKeys;
  private loaded: { commentId: number; record: ReviewRecord }[] = [];

  constructor(
    private readonly db: Database.Database,
    private readonly options: DbStoreOptions
  ) {
    this.tables = commentTables(options.prefix);
    this.metaKeys = options.metaKeys ?? DEFAULT_META_KEYS;
  }

  describe(): string {
    return this.tables.comments;
  }

  load(): LoadResult {
    const missing = [this.tables.comments, this.tables.commentmeta].filter(
      (t) => !tableExists(this.db, t)
    );
    if (missing.length > 0) {
      throw new SchemaMismatchError("Database", missing, "database");
    }

    const postId = this.options.postId ?? null;
    const rows = this.db
      .prepare(
        `SELECT c.comment_ID AS id, c.comment_author AS author, c.comment_content AS body,
                c.comment_date AS date, r.meta_value AS rating,
                v.meta_value AS verified, s.meta_value AS source_id
         FROM ${this.tables.comments} c
         JOIN ${this.tables.commentmeta} r ON r.comment_id = c.comment_ID AND r.meta_key = ?
         LEFT JOIN ${this.tables.commentmeta} v ON v.comment_id = c.comment_ID AND v.meta_key = ?
         LEFT JOIN ${this.tables.commentmeta} s ON s.comment_id = c.comment_ID AND s.meta_key = ?
         WHERE (? IS NULL OR c.comment_post_ID = ?)
         GROUP BY c.comment_ID
         ORDER BY c.comment_ID`
      )
      .all(
        this.metaKeys.rating,
        this.metaKeys.verified,
        this.metaKeys.sourceId,
        postId,
        postId
      ) as CommentRow[];

    let skipped = 0;
    this.loaded = [];
    for (const row of rows) {
      const rating = Math.round(parseFloat(row.rating));
      if (!(rating >= MIN_RATING && rating <= MAX_RATING)) {
        skipped++;
        continue;
      }
      this.loaded.push({
        commentId: row.id,
        record: {
          author: row.author,
          rating,
          body: row.body,
          date: fromSqlDateTime(row.date),
          verified: row.verified === "1",
          sourceId: row.source_id ?? `comment-${row.id}`,
        },
      });
    }

    return { records: this.loaded.map((l) => l.record), skipped };
  }

  commit(records: ReviewRecord[]): number {
    if (records.length !== this.loaded.length) {
      throw new Error(
        `commit expects the ${this.loaded.length} loaded reviews, got ${records.length}`
      );
    }

    const update = this.db.prepare(
      `UPDATE ${this.tables.comments} SET comment_author = ?, comment_content = ? WHERE comment_ID = ?`
    );

    let written = 0;
    this.db.transaction(() => {
      records.forEach((record, i) => {
        const { commentId, record: before } = this.loaded[i];
        if (record.author === before.author && record.body === before.body) return;
        update.run(record.author, record.body, commentId);
        written++;
      });
    })();

    console.log(`[db] updated ${written} comments in ${this.tables.comments}`);
    return written;
  }
}

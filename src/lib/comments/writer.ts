import Database from "better-sqlite3";
import { commentTables, CommentTables, ensureCommentTables, tableExists, toSqlDateTime } from "../db";
import { DuplicateRecordError, InsertFailureError } from "../errors";
import { DEFAULT_META_KEYS, ImportSummary, MetaKeys, ReviewRecord } from "../types";

export interface ImportOptions {
  prefix: string;
  postId: number;
  metaKeys?: MetaKeys;
  /** Records rated below this are left out; 0 keeps everything. */
  minRating?: number;
  dryRun?: boolean;
}

/** Meta rows written per review: rating, verified flag, source id. */
const META_ROWS_PER_REVIEW = 3;

export function sourceIdExists(
  db: Database.Database,
  tables: CommentTables,
  metaKey: string,
  sourceId: string
): boolean {
  const row = db
    .prepare(
      `SELECT 1 AS found
       FROM ${tables.commentmeta} m
       JOIN ${tables.comments} c ON c.comment_ID = m.comment_id
       WHERE m.meta_key = ? AND m.meta_value = ?
       LIMIT 1`
    )
    .get(metaKey, sourceId) as { found: number } | undefined;
  return row !== undefined;
}

export type ReviewInserter = (record: ReviewRecord) => number;

export function createReviewInserter(
  db: Database.Database,
  tables: CommentTables,
  postId: number,
  metaKeys: MetaKeys
): ReviewInserter {
  const insertComment = db.prepare(`
    INSERT INTO ${tables.comments} (
      comment_post_ID, comment_author, comment_date, comment_date_gmt,
      comment_content, comment_approved
    ) VALUES (?, ?, ?, ?, ?, '1')
  `);
  const insertMeta = db.prepare(
    `INSERT INTO ${tables.commentmeta} (comment_id, meta_key, meta_value) VALUES (?, ?, ?)`
  );

  // Comment and its meta rows land together or not at all
  return db.transaction((record: ReviewRecord): number => {
    if (sourceIdExists(db, tables, metaKeys.sourceId, record.sourceId)) {
      throw new DuplicateRecordError(record.sourceId);
    }
    const date = toSqlDateTime(record.date);
    const result = insertComment.run(postId, record.author, date, date, record.body);
    const commentId = Number(result.lastInsertRowid);
    insertMeta.run(commentId, metaKeys.rating, String(record.rating));
    insertMeta.run(commentId, metaKeys.verified, record.verified ? "1" : "0");
    insertMeta.run(commentId, metaKeys.sourceId, record.sourceId);
    return commentId;
  });
}

/**
 * Insert reviews as comments plus meta rows. Re-running with the same records
 * inserts nothing: a sourceId already stored under the prefix is a duplicate.
 * A failing record is rolled back, logged and counted; the batch carries on.
 */
export function importReviews(
  db: Database.Database,
  records: ReviewRecord[],
  options: ImportOptions
): ImportSummary {
  const metaKeys = options.metaKeys ?? DEFAULT_META_KEYS;
  const minRating = options.minRating ?? 0;
  const dryRun = options.dryRun ?? false;

  const tables = dryRun ? commentTables(options.prefix) : ensureCommentTables(db, options.prefix);
  // Nothing can be stored yet when planning against tables that don't exist
  const canQuery = tableExists(db, tables.comments) && tableExists(db, tables.commentmeta);

  const summary: ImportSummary = {
    inserted: 0,
    duplicates: 0,
    failed: 0,
    belowMinRating: 0,
    commentRows: 0,
    metaRows: 0,
  };
  const seen = new Set<string>();
  const insert = dryRun ? null : createReviewInserter(db, tables, options.postId, metaKeys);

  for (const record of records) {
    if (record.rating < minRating) {
      summary.belowMinRating++;
      continue;
    }

    if (seen.has(record.sourceId)) {
      summary.duplicates++;
      continue;
    }
    seen.add(record.sourceId);

    if (!insert) {
      if (canQuery && sourceIdExists(db, tables, metaKeys.sourceId, record.sourceId)) {
        summary.duplicates++;
        continue;
      }
      console.log(`[writer] would insert review ${record.sourceId} by ${record.author}`);
    } else {
      try {
        insert(record);
      } catch (err) {
        if (err instanceof DuplicateRecordError) {
          summary.duplicates++;
          continue;
        }
        const failure = new InsertFailureError(record.sourceId, err);
        console.error(`[writer] ${failure.message}`);
        summary.failed++;
        continue;
      }
    }

    summary.inserted++;
    summary.commentRows++;
    summary.metaRows += META_ROWS_PER_REVIEW;
  }

  console.log(
    `[writer] ${dryRun ? "planned" : "done"}: ${summary.inserted} inserted, ` +
      `${summary.duplicates} duplicates, ${summary.failed} failed, ${summary.belowMinRating} below min rating`
  );
  return summary;
}

import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { InvalidParameterError, SchemaMismatchError } from "./errors";
import { DatabaseConfig } from "./types";

export interface OpenOptions {
  /** Read-only connection; a missing file yields an empty in-memory database. */
  readonly?: boolean;
  /** Fail instead of creating the file when it does not exist. */
  mustExist?: boolean;
}

export function openDatabase(dbConfig: DatabaseConfig, options: OpenOptions = {}): Database.Database {
  if (dbConfig.path === ":memory:") {
    return new Database(":memory:");
  }

  const dbPath = path.resolve(process.cwd(), dbConfig.path);

  if (options.mustExist && !fs.existsSync(dbPath)) {
    throw new SchemaMismatchError("Database", [dbPath], "database");
  }

  if (options.readonly) {
    if (!fs.existsSync(dbPath)) {
      console.log(`[db] ${dbPath} does not exist yet, planning against an empty database`);
      return new Database(":memory:");
    }
    return new Database(dbPath, { readonly: true, fileMustExist: true });
  }

  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

/**
 * Open one connection for the duration of `fn` and always close it, so no
 * handle outlives the invocation that needed it.
 */
export async function withDatabase<T>(
  dbConfig: DatabaseConfig,
  fn: (db: Database.Database) => T | Promise<T>,
  options: OpenOptions = {}
): Promise<T> {
  const db = openDatabase(dbConfig, options);
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

// ===== Comment tables =====

export interface CommentTables {
  comments: string;
  commentmeta: string;
}

const TABLE_PREFIX_PATTERN = /^[A-Za-z0-9_]*$/;

/** Prefixes are spliced into SQL, so only identifier characters are allowed. */
export function commentTables(prefix: string): CommentTables {
  if (!TABLE_PREFIX_PATTERN.test(prefix)) {
    throw new InvalidParameterError("prefix", "may only contain letters, digits and underscores");
  }
  return { comments: `${prefix}comments`, commentmeta: `${prefix}commentmeta` };
}

export function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name = ?")
    .get(table) as { name: string } | undefined;
  return row !== undefined;
}

export function ensureCommentTables(db: Database.Database, prefix: string): CommentTables {
  const tables = commentTables(prefix);

  db.exec(`
    CREATE TABLE IF NOT EXISTS ${tables.comments} (
      comment_ID       INTEGER PRIMARY KEY AUTOINCREMENT,
      comment_post_ID  INTEGER NOT NULL DEFAULT 0,
      comment_author   TEXT NOT NULL,
      comment_date     TEXT NOT NULL,
      comment_date_gmt TEXT NOT NULL,
      comment_content  TEXT NOT NULL,
      comment_approved TEXT NOT NULL DEFAULT '1'
    );
    CREATE INDEX IF NOT EXISTS idx_${tables.comments}_post ON ${tables.comments}(comment_post_ID);

    CREATE TABLE IF NOT EXISTS ${tables.commentmeta} (
      meta_id    INTEGER PRIMARY KEY AUTOINCREMENT,
      comment_id INTEGER NOT NULL REFERENCES ${tables.comments}(comment_ID) ON DELETE CASCADE,
      meta_key   TEXT NOT NULL,
      meta_value TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_${tables.commentmeta}_comment ON ${tables.commentmeta}(comment_id);
    CREATE INDEX IF NOT EXISTS idx_${tables.commentmeta}_key ON ${tables.commentmeta}(meta_key, meta_value);
  `);

  return tables;
}

/** ISO timestamp → "YYYY-MM-DD HH:MM:SS" (UTC). Unparseable input is stored as given. */
export function toSqlDateTime(date: string): string {
  const ms = Date.parse(date);
  if (isNaN(ms)) return date;
  return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}

/** "YYYY-MM-DD HH:MM:SS" (UTC) → ISO timestamp. Anything else comes back unchanged. */
export function fromSqlDateTime(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(value)) return value;
  return new Date(`${value.replace(" ", "T")}Z`).toISOString();
}

// ===== Review Record (canonical, source- and format-independent) =====

export interface ReviewRecord {
  author: string;
  rating: number; // integer 1-5
  body: string;
  date: string; // ISO-8601
  verified: boolean;
  sourceId: string;
}

export const MIN_RATING = 1;
export const MAX_RATING = 5;

// ===== Raw scrape output =====

export type RawReview = Record<string, unknown>;

export interface RawReviewPage {
  page: number;
  reviews: RawReview[];
  totalPages?: number;
}

// ===== Transforms =====

export type ReviewField = "author" | "body";

export interface ChangePreview {
  sourceId: string;
  field: ReviewField;
  before: string;
  after: string;
}

export interface TransformResult {
  changed: number;
  records: ReviewRecord[];
  preview: ChangePreview[];
}

// ===== Database =====

export interface DatabaseConfig {
  path: string;
}

export interface MetaKeys {
  rating: string;
  verified: string;
  sourceId: string;
}

export const DEFAULT_META_KEYS: MetaKeys = {
  rating: "rating",
  verified: "verified",
  sourceId: "source_id",
};

export interface ImportSummary {
  inserted: number;
  duplicates: number;
  failed: number;
  belowMinRating: number;
  commentRows: number;
  metaRows: number;
}

// ===== Operators =====

export interface OperatorResult {
  operator: string;
  dryRun: boolean;
  summary: Record<string, number>;
  preview: ChangePreview[];
  output?: string;
}

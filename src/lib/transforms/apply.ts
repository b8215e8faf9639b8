import { config } from "../config";
import { ChangePreview, ReviewField, ReviewRecord, TransformResult } from "../types";

/**
 * Run `rewrite` over one field of every record and collect what changed.
 * `rewrite` returns null to leave a record alone.
 */
export function transformField(
  records: ReviewRecord[],
  field: ReviewField,
  rewrite: (record: ReviewRecord) => string | null,
  previewLimit = config.previewLimit
): TransformResult {
  const preview: ChangePreview[] = [];
  let changed = 0;

  const out = records.map((record) => {
    const next = rewrite(record);
    if (next === null || next === record[field]) return record;

    changed++;
    if (preview.length < previewLimit) {
      preview.push({ sourceId: record.sourceId, field, before: record[field], after: next });
    }
    return field === "author" ? { ...record, author: next } : { ...record, body: next };
  });

  return { changed, records: out, preview };
}

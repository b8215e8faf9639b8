import { z } from "zod";
import { config } from "../config";
import { commentTables, withDatabase } from "../db";
import { CsvReviewStore } from "../stores/csv-store";
import { DbReviewStore } from "../stores/db-store";
import { ReviewStore } from "../stores/types";
import { ReviewTransform } from "../transforms/types";
import { OperatorResult } from "../types";
import {
  booleanParam,
  choiceParam,
  optionalInteger,
  optionalString,
  requireParam,
  stringParam,
} from "./params";
import { InvocationContext } from "./types";

/** Parameters every transform operator shares: where the batch lives, and dry-run. */
export const targetParams = {
  target: choiceParam("Where the reviews live", ["csv", "database"], "csv"),
  csvPath: optionalString("CSV file to transform (target=csv)"),
  outfile: optionalString("Write the result here instead of overwriting csvPath (target=csv)"),
  prefix: stringParam("Table prefix (target=database)", config.tablePrefix),
  postId: optionalInteger("Only touch reviews on this post (target=database)", { min: 0 }),
  ratingKey: stringParam("Meta key holding the rating", "rating"),
  verifiedKey: stringParam("Meta key holding the verified-purchase flag", "verified"),
  sourceKey: stringParam("Meta key holding the source review id", "source_id"),
  dryRun: booleanParam("Report the changes without saving them"),
};

export type TargetValues = z.infer<z.ZodObject<typeof targetParams>>;

function applyToStore(
  operator: string,
  store: ReviewStore,
  transform: ReviewTransform,
  dryRun: boolean,
  alwaysWrite: boolean
): OperatorResult {
  const { records, skipped } = store.load();
  const result = transform.apply(records);

  if (dryRun) {
    for (const change of result.preview) {
      console.log(`[operator:${operator}] would change ${change.field} of ${change.sourceId}: "${change.before}" → "${change.after}"`);
    }
  } else if (result.changed > 0 || alwaysWrite) {
    store.commit(result.records);
  }

  return {
    operator,
    dryRun,
    summary: { loaded: records.length, skipped, changed: result.changed },
    preview: result.preview,
    output: store.describe(),
  };
}

/**
 * Load the batch from the chosen target, run `transform` over it and, unless
 * this is a dry run, write the changes back.
 */
export async function runTransform(
  operator: string,
  values: TargetValues,
  context: InvocationContext,
  transform: ReviewTransform
): Promise<OperatorResult> {
  if (values.target === "csv") {
    const csvPath = requireParam(values.csvPath, "csvPath");
    const store = new CsvReviewStore(csvPath, values.outfile ?? csvPath);
    return applyToStore(operator, store, transform, values.dryRun, values.outfile !== undefined);
  }

  commentTables(values.prefix);
  return withDatabase(
    context.database,
    (db) => {
      const store = new DbReviewStore(db, {
        prefix: values.prefix,
        postId: values.postId,
        metaKeys: { rating: values.ratingKey, verified: values.verifiedKey, sourceId: values.sourceKey },
      });
      return applyToStore(operator, store, transform, values.dryRun, false);
    },
    { readonly: values.dryRun, mustExist: true }
  );
}

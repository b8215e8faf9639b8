import { z } from "zod";
import { config } from "../../config";
import { importReviews as writeReviews } from "../../comments/writer";
import { readReviewsCsv } from "../../csv/review-csv";
import { commentTables, withDatabase } from "../../db";
import { MAX_RATING } from "../../types";
import { defineOperator } from "../define";
import { booleanParam, numberParam, requiredInteger, requiredString, stringParam } from "../params";

export const importReviews = defineOperator({
  name: "import-reviews",
  description: "Insert a review CSV into the comment tables of a WordPress-style database",
  params: z.object({
    csvPath: requiredString("CSV created by extract-reviews"),
    postId: requiredInteger("ID of the post/product the reviews belong to", { min: 0 }),
    prefix: stringParam("Table prefix", config.tablePrefix),
    ratingKey: stringParam("Meta key for the rating", "rating"),
    verifiedKey: stringParam("Meta key for the verified-purchase flag", "verified"),
    sourceKey: stringParam("Meta key for the source review id", "source_id"),
    minRating: numberParam("Skip reviews rated below this", 0, { min: 0, max: MAX_RATING }),
    dryRun: booleanParam("Plan the inserts without writing"),
  }),
  async run(values, context) {
    const { records, skipped } = readReviewsCsv(values.csvPath);
    const tables = commentTables(values.prefix);

    const summary = await withDatabase(
      context.database,
      (db) =>
        writeReviews(db, records, {
          prefix: values.prefix,
          postId: values.postId,
          minRating: values.minRating,
          dryRun: values.dryRun,
          metaKeys: {
            rating: values.ratingKey,
            verified: values.verifiedKey,
            sourceId: values.sourceKey,
          },
        }),
      { readonly: values.dryRun }
    );

    return {
      operator: "import-reviews",
      dryRun: values.dryRun,
      summary: { read: records.length, malformed: skipped, ...summary },
      preview: [],
      output: tables.comments,
    };
  },
});

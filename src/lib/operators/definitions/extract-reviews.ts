import { z } from "zod";
import { config } from "../../config";
import { appendReviewsCsv, writeReviewsCsv } from "../../csv/review-csv";
import { InvalidParameterError } from "../../errors";
import { getAllSourceNames, getSource } from "../../sources/registry";
import { scrapeReviews } from "../../sources/scrape";
import { defineOperator } from "../define";
import { booleanParam, choiceParam, integerParam, requiredString, stringParam } from "../params";

export const extractReviews = defineOperator({
  name: "extract-reviews",
  description: "Scrape a product's reviews from an e-commerce platform into a CSV file",
  params: z.object({
    source: choiceParam("Platform to scrape", ["aliexpress"], "aliexpress"),
    productId: requiredString("Product ID to fetch reviews for"),
    outfile: stringParam("CSV output file", "reviews.csv"),
    limit: integerParam("Max reviews (0 = all)", 0, { min: 0 }),
    pageSize: integerParam("Reviews per page request", config.reviewPageSize, { min: 1, max: 100 }),
    startPage: integerParam("First page to fetch; above 1, reviews are added to an existing outfile", 1, { min: 1 }),
    dryRun: booleanParam("Scrape and count, but don't write the CSV"),
  }),
  async run(values) {
    const source = getSource(values.source);
    if (!source) {
      throw new InvalidParameterError("source", `must be one of ${getAllSourceNames().join(", ")}`);
    }

    const scraped = await scrapeReviews(source, values.productId, {
      limit: values.limit,
      pageSize: values.pageSize,
      startPage: values.startPage,
    });

    // A resumed scrape adds to what the failed run already wrote
    const resuming = values.startPage > 1;
    let output: string | undefined;
    let written = scraped.records.length;
    if (values.dryRun) {
      console.log(`[operator:extract-reviews] would write ${written} reviews to ${values.outfile}`);
    } else if (resuming) {
      const appended = appendReviewsCsv(values.outfile, scraped.records);
      output = appended.path;
      written = appended.added;
      console.log(`[operator:extract-reviews] added ${written} reviews to ${output}`);
    } else {
      output = writeReviewsCsv(values.outfile, scraped.records);
      console.log(`[operator:extract-reviews] wrote ${output}`);
    }

    if (scraped.failure) {
      throw scraped.failure;
    }

    return {
      operator: "extract-reviews",
      dryRun: values.dryRun,
      summary: {
        pages: scraped.pages,
        written,
        skipped: scraped.skipped,
        duplicates: scraped.duplicates,
      },
      preview: [],
      output,
    };
  },
});

import { InvalidParameterError } from "../errors";
import { MAX_RATING, MIN_RATING, ReviewRecord } from "../types";
import { transformField } from "./apply";
import { createNameGenerator, NameGenerator } from "./names";
import { ReviewTransform } from "./types";

export const DEFAULT_RATING_THRESHOLD = 4;

export interface RenameByRatingOptions {
  threshold?: number;
  generateName?: NameGenerator;
}

/** Re-attribute reviews rated strictly below `threshold` to generated authors. */
export function renameByRating(options: RenameByRatingOptions = {}): ReviewTransform {
  const threshold = options.threshold ?? DEFAULT_RATING_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < MIN_RATING || threshold > MAX_RATING) {
    throw new InvalidParameterError("threshold", `must be between ${MIN_RATING} and ${MAX_RATING}`);
  }
  const generateName = options.generateName ?? createNameGenerator();

  return {
    name: "rename-by-rating",
    apply(records: ReviewRecord[]) {
      return transformField(records, "author", (record) =>
        record.rating < threshold ? generateName() : null
      );
    },
  };
}

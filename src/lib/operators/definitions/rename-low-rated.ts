import { z } from "zod";
import { createNameGenerator } from "../../transforms/names";
import { DEFAULT_RATING_THRESHOLD, renameByRating } from "../../transforms/rename-by-rating";
import { MAX_RATING, MIN_RATING } from "../../types";
import { defineOperator } from "../define";
import { numberParam, optionalInteger } from "../params";
import { runTransform, targetParams } from "../run-transform";

export const renameLowRated = defineOperator({
  name: "rename-low-rated",
  description: "Give reviews rated below a threshold generated author names",
  params: z.object({
    ...targetParams,
    threshold: numberParam("Rename reviews rated strictly below this", DEFAULT_RATING_THRESHOLD, {
      min: MIN_RATING,
      max: MAX_RATING,
    }),
    seed: optionalInteger("Seed for repeatable generated names"),
  }),
  async run(values, context) {
    const transform = renameByRating({
      threshold: values.threshold,
      generateName: createNameGenerator(values.seed),
    });
    return runTransform("rename-low-rated", values, context, transform);
  },
});

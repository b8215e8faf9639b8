import { z } from "zod";
import { replaceWord } from "../../transforms/replace-word";
import { defineOperator } from "../define";
import { requiredString, stringParam } from "../params";
import { runTransform, targetParams } from "../run-transform";

export const replaceWordOperator = defineOperator({
  name: "replace-word",
  description: "Replace a whole word or phrase in review bodies, ignoring case",
  params: z.object({
    ...targetParams,
    search: requiredString("Word or phrase to find (whole words only)"),
    replace: stringParam("Replacement text", ""),
  }),
  async run(values, context) {
    const transform = replaceWord({ search: values.search, replace: values.replace });
    return runTransform("replace-word", values, context, transform);
  },
});

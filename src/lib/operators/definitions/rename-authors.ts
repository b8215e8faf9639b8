import { z } from "zod";
import { PLACEHOLDER_AUTHOR } from "../../normalization";
import { createNameGenerator } from "../../transforms/names";
import { renameDefaultName } from "../../transforms/rename-default-name";
import { defineOperator } from "../define";
import { optionalInteger, stringParam } from "../params";
import { runTransform, targetParams } from "../run-transform";

export const renameAuthors = defineOperator({
  name: "rename-authors",
  description: "Replace the platform's placeholder author name with realistic generated names",
  params: z.object({
    ...targetParams,
    match: stringParam("Author name to replace (whole value, case-insensitive)", PLACEHOLDER_AUTHOR),
    seed: optionalInteger("Seed for repeatable generated names"),
  }),
  async run(values, context) {
    const transform = renameDefaultName({
      placeholder: values.match,
      generateName: createNameGenerator(values.seed),
    });
    return runTransform("rename-authors", values, context, transform);
  },
});

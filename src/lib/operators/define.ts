import { z } from "zod";
import { parseParams } from "./params";
import { Operator, OperatorDefinition } from "./types";

export function defineOperator<T extends z.AnyZodObject>(definition: OperatorDefinition<T>): Operator {
  return {
    name: definition.name,
    description: definition.description,
    params: definition.params,
    async invoke(values, context) {
      const parsed = parseParams(definition.params, values);
      console.log(`[operator:${definition.name}] starting`);
      const result = await definition.run(parsed, context);
      console.log(`[operator:${definition.name}] done ${JSON.stringify(result.summary)}`);
      return result;
    },
  };
}

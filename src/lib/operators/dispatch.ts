import { config } from "../config";
import { OperatorResult } from "../types";
import { getOperator } from "./registry";
import { InvocationContext } from "./types";

export function defaultContext(): InvocationContext {
  return { database: { path: config.dbPath } };
}

/**
 * Run one operator by name. Unknown names and bad parameters are rejected
 * before the operator touches any file, network or database.
 */
export async function invokeOperator(
  name: string,
  values: Record<string, unknown>,
  context: InvocationContext = defaultContext()
): Promise<OperatorResult> {
  const operator = getOperator(name);
  return operator.invoke(values, context);
}

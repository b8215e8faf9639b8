import { z } from "zod";
import { DatabaseConfig, OperatorResult } from "../types";
import { ParamSpec } from "./params";

/** Per-invocation settings shared by every operator, e.g. the database to use. */
export interface InvocationContext {
  database: DatabaseConfig;
}

export interface OperatorDefinition<T extends z.AnyZodObject> {
  name: string;
  description: string;
  params: T;
  run(values: z.infer<T>, context: InvocationContext): Promise<OperatorResult>;
}

/** An operator as the registry sees it: untyped values in, validated before run. */
export interface Operator {
  name: string;
  description: string;
  params: z.AnyZodObject;
  invoke(values: Record<string, unknown>, context: InvocationContext): Promise<OperatorResult>;
}

export interface OperatorSchema {
  name: string;
  description: string;
  params: ParamSpec[];
}

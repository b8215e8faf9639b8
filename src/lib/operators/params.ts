import { z } from "zod";
import { InvalidParameterError, MissingParameterError } from "../errors";

export type ParamType = "string" | "integer" | "number" | "boolean" | "choice";

/** What a form or a --help listing needs to know about one parameter. */
export interface ParamSpec {
  name: string;
  type: ParamType;
  help: string;
  required: boolean;
  default?: string | number | boolean;
  min?: number;
  max?: number;
  choices?: readonly string[];
}

type ParamMeta = Omit<ParamSpec, "name">;

const paramMeta = new WeakMap<z.ZodTypeAny, ParamMeta>();

function register<T extends z.ZodTypeAny>(schema: T, meta: ParamMeta): T {
  paramMeta.set(schema, meta);
  return schema;
}

// Form fields arrive as "" when left empty
function blankToUndefined(value: unknown): unknown {
  if (value === null || value === "") return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
}

function toNumber(value: unknown): unknown {
  const v = blankToUndefined(value);
  return typeof v === "string" ? Number(v.trim()) : v;
}

function toBoolean(value: unknown): unknown {
  const v = blankToUndefined(value);
  if (typeof v !== "string") return v;
  const lower = v.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(lower)) return true;
  if (["false", "0", "no", "off"].includes(lower)) return false;
  return v;
}

interface RangeOptions {
  min?: number;
  max?: number;
}

function withRange(schema: z.ZodNumber, { min, max }: RangeOptions): z.ZodNumber {
  let s = schema;
  if (min !== undefined) s = s.min(min);
  if (max !== undefined) s = s.max(max);
  return s;
}

export function requiredString(help: string) {
  return register(z.preprocess(blankToUndefined, z.string()), { type: "string", help, required: true });
}

export function optionalString(help: string) {
  return register(z.preprocess(blankToUndefined, z.string().optional()), {
    type: "string",
    help,
    required: false,
  });
}

export function stringParam(help: string, defaultValue: string) {
  return register(z.preprocess(blankToUndefined, z.string().default(defaultValue)), {
    type: "string",
    help,
    required: false,
    default: defaultValue,
  });
}

export function requiredInteger(help: string, range: RangeOptions = {}) {
  return register(z.preprocess(toNumber, withRange(z.number().int(), range)), {
    type: "integer",
    help,
    required: true,
    ...range,
  });
}

export function optionalInteger(help: string, range: RangeOptions = {}) {
  return register(z.preprocess(toNumber, withRange(z.number().int(), range).optional()), {
    type: "integer",
    help,
    required: false,
    ...range,
  });
}

export function integerParam(help: string, defaultValue: number, range: RangeOptions = {}) {
  return register(z.preprocess(toNumber, withRange(z.number().int(), range).default(defaultValue)), {
    type: "integer",
    help,
    required: false,
    default: defaultValue,
    ...range,
  });
}

export function numberParam(help: string, defaultValue: number, range: RangeOptions = {}) {
  return register(z.preprocess(toNumber, withRange(z.number(), range).default(defaultValue)), {
    type: "number",
    help,
    required: false,
    default: defaultValue,
    ...range,
  });
}

export function booleanParam(help: string, defaultValue = false) {
  return register(z.preprocess(toBoolean, z.boolean().default(defaultValue)), {
    type: "boolean",
    help,
    required: false,
    default: defaultValue,
  });
}

export function choiceParam<const T extends readonly [string, ...string[]]>(
  help: string,
  choices: T,
  defaultValue: T[number]
) {
  return register(z.preprocess(blankToUndefined, z.enum(choices).default(defaultValue)), {
    type: "choice",
    help,
    required: false,
    default: defaultValue,
    choices,
  });
}

/** Flatten an operator's parameter object into form-ready specs, in declaration order. */
export function describeParams(schema: z.AnyZodObject): ParamSpec[] {
  return Object.entries<z.ZodTypeAny>(schema.shape).map(([name, field]) => {
    const meta = paramMeta.get(field);
    if (!meta) {
      throw new Error(`Parameter "${name}" was not declared with a param helper`);
    }
    return { name, ...meta };
  });
}

/**
 * Validate raw values against an operator's parameters. The first problem
 * becomes a MissingParameterError or InvalidParameterError naming the field.
 */
export function parseParams<T extends z.AnyZodObject>(
  schema: T,
  raw: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const param = String(issue?.path[0] ?? "params");
  if (issue?.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    throw new MissingParameterError(param);
  }
  throw new InvalidParameterError(param, issue?.message ?? "invalid value");
}

/** Throw MissingParameterError unless a conditionally required value is present. */
export function requireParam<T>(value: T | undefined, name: string): T {
  if (value === undefined) throw new MissingParameterError(name);
  return value;
}

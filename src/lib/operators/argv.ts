import { InvalidParameterError } from "../errors";
import { describeParams } from "./params";
import { Operator } from "./types";

export interface ParsedArgs {
  values: Record<string, string | boolean>;
  database?: string;
}

export function toFlag(name: string): string {
  return `--${name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

/**
 * Turn `--kebab-case value` flags into the operator's camelCase parameter
 * values. Boolean parameters are bare switches; `--database` picks the
 * database file for this invocation.
 */
export function parseOperatorArgs(operator: Operator, argv: string[]): ParsedArgs {
  const specs = describeParams(operator.params);
  const byFlag = new Map(specs.map((spec) => [toFlag(spec.name), spec]));
  const parsed: ParsedArgs = { values: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new InvalidParameterError(flag, "expects a value");
      }
      i++;
      return next;
    };

    if (flag === "--database") {
      parsed.database = takeValue();
      continue;
    }

    const spec = byFlag.get(flag);
    if (!spec) {
      throw new InvalidParameterError(arg, `unknown flag for ${operator.name}`);
    }

    parsed.values[spec.name] = spec.type === "boolean" ? (inline ?? true) : takeValue();
  }

  return parsed;
}

import { UnknownOperatorError } from "../errors";
import { extractReviews } from "./definitions/extract-reviews";
import { importReviews } from "./definitions/import-reviews";
import { renameAuthors } from "./definitions/rename-authors";
import { renameLowRated } from "./definitions/rename-low-rated";
import { replaceWordOperator } from "./definitions/replace-word";
import { describeParams } from "./params";
import { Operator, OperatorSchema } from "./types";

const ALL_OPERATORS: Operator[] = [
  extractReviews,
  importReviews,
  renameAuthors,
  renameLowRated,
  replaceWordOperator,
];

export function getAllOperatorNames(): string[] {
  return ALL_OPERATORS.map((op) => op.name);
}

export function getOperator(name: string): Operator {
  const op = ALL_OPERATORS.find((o) => o.name === name);
  if (!op) throw new UnknownOperatorError(name, getAllOperatorNames());
  return op;
}

export function describeOperator(op: Operator): OperatorSchema {
  return { name: op.name, description: op.description, params: describeParams(op.params) };
}

export function describeOperators(): OperatorSchema[] {
  return ALL_OPERATORS.map(describeOperator);
}

import { InvalidParameterError } from "../errors";
import { ReviewRecord } from "../types";
import { transformField } from "./apply";
import { ReviewTransform } from "./types";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word matcher: the target may not touch a letter,
 * digit or underscore on either side, so "shop" never matches inside "shopper".
 */
export function wholeWordPattern(target: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(target)}(?![\\p{L}\\p{N}_])`, "giu");
}

export function replaceWholeWord(text: string, target: string, replacement: string): string {
  // Function replacer: "$&" and friends in the replacement stay literal
  return text.replace(wholeWordPattern(target), () => replacement);
}

export interface ReplaceWordOptions {
  search: string;
  replace: string;
}

export function replaceWord(options: ReplaceWordOptions): ReviewTransform {
  const search = options.search.trim();
  if (!search) {
    throw new InvalidParameterError("search", "must not be blank");
  }

  return {
    name: "replace-word",
    apply(records: ReviewRecord[]) {
      return transformField(records, "body", (record) =>
        replaceWholeWord(record.body, search, options.replace)
      );
    },
  };
}

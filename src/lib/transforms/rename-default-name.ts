import { PLACEHOLDER_AUTHOR } from "../normalization";
import { ReviewRecord } from "../types";
import { transformField } from "./apply";
import { createNameGenerator, NameGenerator } from "./names";
import { ReviewTransform } from "./types";

export interface RenameDefaultNameOptions {
  placeholder?: string;
  generateName?: NameGenerator;
}

/** Give every review signed with the platform placeholder a realistic author name. */
export function renameDefaultName(options: RenameDefaultNameOptions = {}): ReviewTransform {
  const placeholder = (options.placeholder ?? PLACEHOLDER_AUTHOR).trim().toLowerCase();
  const generateName = options.generateName ?? createNameGenerator();

  return {
    name: "rename-default-name",
    apply(records: ReviewRecord[]) {
      return transformField(records, "author", (record) =>
        record.author.trim().toLowerCase() === placeholder ? generateName() : null
      );
    },
  };
}

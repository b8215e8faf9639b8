import { ReviewRecord, TransformResult } from "../types";

export interface ReviewTransform {
  name: string;
  /** Pure: returns new records; the input batch is left untouched. */
  apply(records: ReviewRecord[]): TransformResult;
}

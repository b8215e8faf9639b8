import { ZodError } from "zod";
import { ToolkitError } from "./errors";

export interface ErrorBody {
  error: {
    code: string;
    stage?: string;
    message: string;
    details?: unknown;
  };
}

/** Map a thrown value to the status and JSON body a route should answer with. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: { error: { code: "VALIDATION_FAILED", message: "validation_failed", details: err.issues } },
    };
  }

  if (err instanceof ToolkitError) {
    return {
      status: err.statusCode,
      body: { error: { code: err.code, stage: err.stage, message: err.message, details: err.details } },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: "INTERNAL_ERROR",
        message: err instanceof Error ? err.message : "internal_error",
      },
    },
  };
}

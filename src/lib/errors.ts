export type ErrorStage = "source" | "normalize" | "csv" | "database" | "dispatch";

export class ToolkitError extends Error {
  readonly code: string;
  readonly stage: ErrorStage;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    stage: ErrorStage,
    message: string,
    statusCode = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ToolkitError";
    this.code = code;
    this.stage = stage;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Retries exhausted for a page; `page` is where a resumed scrape should start. */
export class SourceUnavailableError extends ToolkitError {
  readonly page: number;

  constructor(source: string, page: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("SOURCE_UNAVAILABLE", "source", `${source} unavailable at page ${page}: ${reason}`, 502, {
      source,
      page,
    });
    this.name = "SourceUnavailableError";
    this.page = page;
  }
}

export class MalformedRecordError extends ToolkitError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super("MALFORMED_RECORD", "normalize", `Malformed record: ${field} ${reason}`, 422, { field });
    this.name = "MalformedRecordError";
    this.field = field;
  }
}

export class SchemaMismatchError extends ToolkitError {
  readonly missing: string[];

  constructor(what: string, missing: string[], stage: ErrorStage = "csv") {
    super("SCHEMA_MISMATCH", stage, `${what} is missing: ${missing.join(", ")}`, 422, { missing });
    this.name = "SchemaMismatchError";
    this.missing = missing;
  }
}

export class UnknownOperatorError extends ToolkitError {
  constructor(name: string, available: string[]) {
    super("UNKNOWN_OPERATOR", "dispatch", `Unknown operator "${name}"`, 404, { available });
    this.name = "UnknownOperatorError";
  }
}

export class MissingParameterError extends ToolkitError {
  readonly param: string;

  constructor(param: string) {
    super("MISSING_PARAMETER", "dispatch", `Missing required parameter "${param}"`, 400, { param });
    this.name = "MissingParameterError";
    this.param = param;
  }
}

export class InvalidParameterError extends ToolkitError {
  readonly param: string;

  constructor(param: string, reason: string) {
    super("INVALID_PARAMETER", "dispatch", `Invalid parameter "${param}": ${reason}`, 400, { param });
    this.name = "InvalidParameterError";
    this.param = param;
  }
}

export class DuplicateRecordError extends ToolkitError {
  constructor(sourceId: string) {
    super("DUPLICATE_RECORD", "database", `Review ${sourceId} already imported`, 409, { sourceId });
    this.name = "DuplicateRecordError";
  }
}

export class InsertFailureError extends ToolkitError {
  constructor(sourceId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("INSERT_FAILURE", "database", `Failed to insert review ${sourceId}: ${reason}`, 500, {
      sourceId,
    });
    this.name = "InsertFailureError";
  }
}

export class InvalidBodyError extends ToolkitError {
  constructor(reason: string) {
    super("INVALID_BODY", "dispatch", `Request body is not valid JSON: ${reason}`, 400);
    this.name = "InvalidBodyError";
  }
}

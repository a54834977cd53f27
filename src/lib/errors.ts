export type ErrorCategory = "validation" | "transport" | "cancelled";

export class PipelineError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;

  constructor(code: string, category: ErrorCategory, message: string) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.category = category;
  }
}

export class MissingColumnError extends PipelineError {
  readonly source: string;
  readonly missingColumns: string[];

  constructor(source: string, missingColumns: string[]) {
    super(
      "missing_column",
      "validation",
      `${source} export is missing required columns: ${missingColumns.join(", ")}`
    );
    this.name = "MissingColumnError";
    this.source = source;
    this.missingColumns = missingColumns;
  }
}

/** Both exports failed header validation. */
export class ExportsRejectedError extends PipelineError {
  readonly errors: MissingColumnError[];

  constructor(errors: MissingColumnError[]) {
    super("missing_columns", "validation", errors.map((err) => err.message).join("; "));
    this.name = "ExportsRejectedError";
    this.errors = errors;
  }
}

export type InvalidRowReason = "missing_business_id" | "missing_page_url";

export class InvalidRowError extends PipelineError {
  readonly source: string;
  readonly rowNumber: number;
  readonly reasons: InvalidRowReason[];

  constructor(source: string, rowNumber: number, reasons: InvalidRowReason[]) {
    super(
      "invalid_row",
      "validation",
      `${source} row ${rowNumber} skipped: ${reasons.join(", ")}`
    );
    this.name = "InvalidRowError";
    this.source = source;
    this.rowNumber = rowNumber;
    this.reasons = reasons;
  }
}

export class UploadRejectedError extends PipelineError {
  readonly fileName: string;

  constructor(fileName: string, message: string) {
    super("upload_rejected", "validation", message);
    this.name = "UploadRejectedError";
    this.fileName = fileName;
  }
}

export class FilterInputError extends PipelineError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string, message?: string) {
    super("filter_input", "validation", message ?? `Invalid ${field}: "${value}"`);
    this.name = "FilterInputError";
    this.field = field;
    this.value = value;
  }
}

export class UnknownMetricError extends PipelineError {
  readonly metric: string;

  constructor(metric: string, known: readonly string[]) {
    super(
      "unknown_metric",
      "validation",
      `Unknown sort metric "${metric}". Expected one of: ${known.join(", ")}`
    );
    this.name = "UnknownMetricError";
    this.metric = metric;
  }
}

export type TransportReason =
  | "not_configured"
  | "not_found"
  | "access_denied"
  | "network"
  | "http_error"
  | "parse"
  | "invalid";

export class ReferenceUnavailableError extends PipelineError {
  readonly reason: TransportReason;
  readonly status: number | null;
  readonly recoverable = true as const;

  constructor(reason: TransportReason, message: string, status: number | null = null) {
    super("reference_unavailable", "transport", message);
    this.name = "ReferenceUnavailableError";
    this.reason = reason;
    this.status = status;
  }
}

export class TemplateUnavailableError extends PipelineError {
  readonly reason: TransportReason;
  readonly status: number | null;

  constructor(reason: TransportReason, message: string, status: number | null = null) {
    super("template_unavailable", "transport", message);
    this.name = "TemplateUnavailableError";
    this.reason = reason;
    this.status = status;
  }
}

export class ReportCancelledError extends PipelineError {
  readonly completedCases: number;

  constructor(completedCases: number) {
    super(
      "report_cancelled",
      "cancelled",
      `Report generation cancelled after ${completedCases} captured case(s).`
    );
    this.name = "ReportCancelledError";
    this.completedCases = completedCases;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "object" && error && "message" in error) {
    const maybeMessage = error.message;
    if (typeof maybeMessage === "string" && maybeMessage.trim()) return maybeMessage.trim();
  }
  return String(error);
}

export function getErrorStatus(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  for (const key of ["status", "statusCode", "code"] as const) {
    if (!(key in error)) continue;
    const raw: unknown = Reflect.get(error, key);
    if (typeof raw === "number" && Number.isFinite(raw)) return raw;
  }
  return null;
}

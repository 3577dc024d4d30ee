export type ErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "NO_TEMPLATE"
  | "UPLOAD"
  | "BACKEND"
  | "TIMEOUT";

// Extra fields that travel with an error into the tool's failure payload,
// e.g. the offending value and the expected data type.
export type ErrorContext = Record<string, string | number | boolean | null>;

export class RuleWorkflowError extends Error {
  readonly code: ErrorCode;
  readonly details: string[];
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, details: string[] = [], context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    this.context = context;
  }
}

export class ValidationError extends RuleWorkflowError {
  constructor(message: string, details: string[] = [], context: ErrorContext = {}) {
    super("VALIDATION", message, details, context);
  }
}

export class NotFoundError extends RuleWorkflowError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class NoTemplateError extends RuleWorkflowError {
  constructor(message: string) {
    super("NO_TEMPLATE", message);
  }
}

export class UploadError extends RuleWorkflowError {
  constructor(message: string) {
    super("UPLOAD", message);
  }
}

export class BackendError extends RuleWorkflowError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("BACKEND", message, [], status === undefined ? {} : { status });
    this.status = status;
  }
}

export class TimeoutError extends RuleWorkflowError {
  constructor(message: string) {
    super("TIMEOUT", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

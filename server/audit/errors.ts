export type AuditErrorCode =
  | "INVALID_URL"
  | "NO_SUCCESSFUL_PAGES"
  | "LLM_UNAVAILABLE"
  | "LLM_REQUEST_FAILED"
  | "PLAN_NOT_FOUND"
  | "CONFIG_INVALID";

export class AuditError extends Error {
  readonly code: AuditErrorCode;

  constructor(code: AuditErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidUrlError extends AuditError {
  constructor(url: string) {
    super("INVALID_URL", `Invalid URL: ${url}`);
  }
}

export class NoSuccessfulPagesError extends AuditError {
  readonly attempted: number;

  constructor(attempted: number) {
    super("NO_SUCCESSFUL_PAGES", "Failed to fetch any pages.");
    this.attempted = attempted;
  }
}

/** Raised when an LLM client cannot be built: unknown provider, bad identifier or missing key. */
export class LlmUnavailableError extends AuditError {
  constructor(message: string) {
    super("LLM_UNAVAILABLE", message);
  }
}

export class LlmRequestError extends AuditError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("LLM_REQUEST_FAILED", message, options);
    this.status = status;
  }
}

export class PlanNotFoundError extends AuditError {
  constructor(path: string) {
    super("PLAN_NOT_FOUND", `Audit plan not found: ${path}`);
  }
}

export class ConfigError extends AuditError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

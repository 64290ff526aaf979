// =============================================================================
// Normalized Comparison Error Codes
// =============================================================================

/**
 * Error codes for everything that can abort a comparison run.
 * Provider errors are normalized into these before they leave the client.
 */
export enum ComparisonErrorCode {
  /** Missing or invalid settings - raised before any network call */
  Configuration = "configuration",
  /** Dataset value has no canonical representation in the target notation */
  Encoding = "encoding",
  /** Invalid or missing API key, or key lacks access to the deployment */
  Authentication = "authentication",
  /** Rate/quota exceeded - retryable after delay */
  RateLimit = "rate_limit",
  /** Network fault, timeout or provider server error - retryable */
  ServiceUnavailable = "service_unavailable",
  /** Malformed request, unknown deployment or prompt over the context window */
  InvalidRequest = "invalid_request",
  /** The run was aborted by the caller */
  Cancelled = "cancelled",
}

/**
 * Pipeline stage that raised the error, shown to the user before exit
 */
export type ComparisonStage =
  | "configuration"
  | "encoding"
  | "authentication"
  | "request";

export const ComparisonErrorStages: Record<
  ComparisonErrorCode,
  ComparisonStage
> = {
  [ComparisonErrorCode.Configuration]: "configuration",
  [ComparisonErrorCode.Encoding]: "encoding",
  [ComparisonErrorCode.Authentication]: "authentication",
  [ComparisonErrorCode.RateLimit]: "request",
  [ComparisonErrorCode.ServiceUnavailable]: "request",
  [ComparisonErrorCode.InvalidRequest]: "request",
  [ComparisonErrorCode.Cancelled]: "request",
};

/**
 * User-friendly hint for each error code
 */
export const ComparisonErrorHints: Record<ComparisonErrorCode, string> = {
  [ComparisonErrorCode.Configuration]:
    "Check your .env file or environment variables.",
  [ComparisonErrorCode.Encoding]:
    "The dataset must contain only strings, finite numbers, booleans, nulls, arrays and plain objects.",
  [ComparisonErrorCode.Authentication]:
    "Invalid API key. Please check AZURE_OPENAI_API_KEY.",
  [ComparisonErrorCode.RateLimit]:
    "Too many requests. Please wait a moment and run the comparison again.",
  [ComparisonErrorCode.ServiceUnavailable]:
    "The LLM service could not be reached or failed. Please try again in a moment.",
  [ComparisonErrorCode.InvalidRequest]:
    "The request was rejected. Check the deployment name and the prompt size.",
  [ComparisonErrorCode.Cancelled]: "The comparison was cancelled.",
};

/**
 * Error codes that indicate the operation could succeed if repeated.
 * The harness makes a single attempt either way.
 */
export const RetryableErrorCodes: Set<ComparisonErrorCode> = new Set([
  ComparisonErrorCode.RateLimit,
  ComparisonErrorCode.ServiceUnavailable,
]);

// =============================================================================
// Error classes
// =============================================================================

export class ComparisonError extends Error {
  readonly code: ComparisonErrorCode;
  readonly stage: ComparisonStage;
  readonly isRetryable: boolean;

  constructor(
    code: ComparisonErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ComparisonError";
    this.code = code;
    this.stage = ComparisonErrorStages[code];
    this.isRetryable = RetryableErrorCodes.has(code);
  }

  get hint(): string {
    return ComparisonErrorHints[this.code];
  }
}

export class ConfigurationError extends ComparisonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ComparisonErrorCode.Configuration, message, options);
    this.name = "ConfigurationError";
  }
}

export class EncodingError extends ComparisonError {
  /** Location of the offending value, e.g. `$.listings[2].price` */
  readonly path: string;

  constructor(path: string, message: string) {
    super(ComparisonErrorCode.Encoding, `${message} at ${path}`);
    this.name = "EncodingError";
    this.path = path;
  }
}

export class AuthenticationError extends ComparisonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ComparisonErrorCode.Authentication, message, options);
    this.name = "AuthenticationError";
  }
}

export class RateLimitError extends ComparisonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ComparisonErrorCode.RateLimit, message, options);
    this.name = "RateLimitError";
  }
}

export class ServiceUnavailableError extends ComparisonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ComparisonErrorCode.ServiceUnavailable, message, options);
    this.name = "ServiceUnavailableError";
  }
}

export class InvalidRequestError extends ComparisonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ComparisonErrorCode.InvalidRequest, message, options);
    this.name = "InvalidRequestError";
  }
}

export class RunCancelledError extends ComparisonError {
  constructor(
    message = "Comparison run was cancelled",
    options?: { cause?: unknown },
  ) {
    super(ComparisonErrorCode.Cancelled, message, options);
    this.name = "RunCancelledError";
  }
}

/**
 * Type guard to check if a value is one of the comparison errors
 */
export function isComparisonError(error: unknown): error is ComparisonError {
  return error instanceof ComparisonError;
}

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import logger from "@/logging";
import {
  AuthenticationError,
  type ComparisonError,
  InvalidRequestError,
  isComparisonError,
  RateLimitError,
  RunCancelledError,
  ServiceUnavailableError,
} from "@/types";

/**
 * Azure OpenAI error codes (from response body `error.code` field)
 * @see https://learn.microsoft.com/en-us/azure/ai-services/openai/reference
 */
export const AzureOpenAIErrorCodes = {
  INVALID_API_KEY: "invalid_api_key",
  UNAUTHORIZED: "401",
  CONTEXT_LENGTH_EXCEEDED: "context_length_exceeded",
  CONTENT_FILTER: "content_filter",
  DEPLOYMENT_NOT_FOUND: "DeploymentNotFound",
  RATE_LIMIT: "429",
} as const;

/**
 * OpenAI-compatible error types (from response body `error.type` field)
 */
export const OpenAIErrorTypes = {
  INVALID_REQUEST: "invalid_request_error",
  AUTHENTICATION: "authentication_error",
  RATE_LIMIT: "rate_limit_exceeded",
  SERVER_ERROR: "server_error",
  SERVICE_UNAVAILABLE: "service_unavailable",
} as const;

type ErrorFactory = (message: string, cause: unknown) => ComparisonError;

const authentication: ErrorFactory = (message, cause) =>
  new AuthenticationError(message, { cause });
const rateLimit: ErrorFactory = (message, cause) =>
  new RateLimitError(message, { cause });
const serviceUnavailable: ErrorFactory = (message, cause) =>
  new ServiceUnavailableError(message, { cause });
const invalidRequest: ErrorFactory = (message, cause) =>
  new InvalidRequestError(message, { cause });

/**
 * Pick an error class from error.code, then error.type
 */
function factoryForApiError(error: APIError): ErrorFactory | null {
  switch (error.code) {
    case AzureOpenAIErrorCodes.INVALID_API_KEY:
    case AzureOpenAIErrorCodes.UNAUTHORIZED:
      return authentication;
    case AzureOpenAIErrorCodes.RATE_LIMIT:
      return rateLimit;
    case AzureOpenAIErrorCodes.CONTEXT_LENGTH_EXCEEDED:
    case AzureOpenAIErrorCodes.CONTENT_FILTER:
    case AzureOpenAIErrorCodes.DEPLOYMENT_NOT_FOUND:
      return invalidRequest;
  }

  switch (error.type) {
    case OpenAIErrorTypes.AUTHENTICATION:
      return authentication;
    case OpenAIErrorTypes.RATE_LIMIT:
      return rateLimit;
    case OpenAIErrorTypes.SERVER_ERROR:
    case OpenAIErrorTypes.SERVICE_UNAVAILABLE:
      return serviceUnavailable;
    case OpenAIErrorTypes.INVALID_REQUEST:
      return invalidRequest;
  }

  return null;
}

/**
 * Generic status code to error class mapping (fallback)
 */
function factoryForStatus(status: number | undefined): ErrorFactory {
  if (status === undefined) {
    return serviceUnavailable;
  }

  switch (status) {
    case 401:
    case 403:
      return authentication;
    case 429:
      return rateLimit;
    case 408:
      return serviceUnavailable;
    case 400:
    case 404:
    case 413:
    case 422:
      return invalidRequest;
    default:
      if (status >= 500) {
        return serviceUnavailable;
      }
      return invalidRequest;
  }
}

/**
 * Map an error thrown by the OpenAI SDK to the comparison error taxonomy.
 * Errors that are already ComparisonErrors pass through untouched.
 */
export function mapProviderError(
  error: unknown,
  context: { deployment: string; timeoutMs?: number },
): ComparisonError {
  if (isComparisonError(error)) {
    return error;
  }

  // Order matters: the timeout error is a connection error, and the abort
  // error is an APIError without a status
  if (error instanceof APIUserAbortError) {
    return new RunCancelledError("Request was aborted before completion", {
      cause: error,
    });
  }

  if (error instanceof APIConnectionTimeoutError) {
    return new ServiceUnavailableError(
      context.timeoutMs
        ? `Request timed out after ${context.timeoutMs}ms`
        : "Request timed out",
      { cause: error },
    );
  }

  if (error instanceof APIConnectionError) {
    return new ServiceUnavailableError(
      `Could not connect to the LLM service: ${error.message}`,
      { cause: error },
    );
  }

  if (error instanceof APIError) {
    const factory = factoryForApiError(error) ?? factoryForStatus(error.status);
    const mapped = factory(
      `${error.message} (deployment: ${context.deployment})`,
      error,
    );

    logger.info(
      {
        deployment: context.deployment,
        status: error.status,
        code: error.code,
        type: error.type,
        mappedCode: mapped.code,
      },
      "[CompletionClient] Mapped provider error",
    );

    return mapped;
  }

  if (error instanceof Error && error.name === "AbortError") {
    return new RunCancelledError("Request was aborted before completion", {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ServiceUnavailableError(
    `Unexpected failure calling the LLM service: ${message}`,
    { cause: error },
  );
}

/**
 * Base custom error class for application-specific errors.
 */
export class BaseError extends Error {
  public code: string;
  public readonly status: number; // HTTP status code equivalent
  public readonly details?: unknown; // Additional details

  constructor(
    message: string,
    code: string,
    status: number,
    details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name; // Set the error name to the class name
    this.code = code;
    this.status = status;
    this.details = details;
    // Capture stack trace (excluding constructor)
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures (e.g., invalid input).
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION_ERROR", 400, details);
  }
}

/**
 * Error when an expected entity or resource is not found.
 */
export class NotFoundError extends BaseError {
  constructor(message: string = "Resource not found") {
    super(message, "NOT_FOUND", 404);
  }
}

/**
 * Error for configuration problems.
 */
export class ConfigurationError extends BaseError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", 500);
  }
}

/**
 * Error for issues during service processing unrelated to input validation.
 */
export class ServiceError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, "SERVICE_ERROR", 500, details);
  }
}

/**
 * Raised when the HellHub client is used outside its open/close scope,
 * or when a request is cut short because its scope was closed.
 */
export class HellHubClientStateError extends BaseError {
  constructor(message: string) {
    super(message, "CLIENT_NOT_OPEN", 500);
  }
}

/**
 * Error originating from the HellHub Collective API.
 * Extends ServiceError as it relates to an external service failure.
 */
export class HellHubApiError extends ServiceError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.code = "HELLHUB_API_ERROR";
  }
}

/**
 * Non-2xx response from the API.
 */
export class HellHubHttpError extends HellHubApiError {
  public readonly endpoint: string;
  public readonly httpStatus: number;

  constructor(
    endpoint: string,
    httpStatus: number,
    statusText: string,
    apiMessage?: string
  ) {
    const summary =
      httpStatus === 404
        ? `Resource not found at ${endpoint}`
        : `HellHub API request to ${endpoint} failed with HTTP ${httpStatus}${statusText ? ` ${statusText}` : ""}`;
    super(apiMessage ? `${summary}: ${apiMessage}` : summary, {
      endpoint,
      httpStatus,
    });
    this.code = "HELLHUB_HTTP_ERROR";
    this.endpoint = endpoint;
    this.httpStatus = httpStatus;
  }
}

/**
 * The request never produced a response (DNS, refused connection, reset...).
 */
export class HellHubNetworkError extends HellHubApiError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.code = "HELLHUB_NETWORK_ERROR";
  }
}

export class HellHubTimeoutError extends HellHubNetworkError {
  constructor(endpoint: string, timeoutMs: number) {
    super(`HellHub API request to ${endpoint} timed out after ${timeoutMs}ms`);
    this.code = "HELLHUB_TIMEOUT";
  }
}

/**
 * The API answered, but the body was not JSON or did not match the expected shape.
 */
export class HellHubResponseError extends HellHubApiError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.code = "HELLHUB_INVALID_RESPONSE";
  }
}

export class HellHubEndpointUnavailableError extends HellHubApiError {
  constructor(endpoint: string, message: string) {
    super(message, { endpoint });
    this.code = "HELLHUB_ENDPOINT_UNAVAILABLE";
  }
}

export type ErrorKind =
  | "validation"
  | "not_found"
  | "http"
  | "network"
  | "timeout"
  | "invalid_response"
  | "unavailable"
  | "client_state"
  | "configuration"
  | "internal";

export interface ErrorDescription {
  kind: ErrorKind;
  message: string;
  code?: string;
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error !== null && typeof error === "object") {
    try {
      return JSON.stringify(error);
    } catch {
      return "An unknown error occurred";
    }
  }
  return "An unknown error occurred";
}

function classify(error: unknown): ErrorKind {
  // Subclasses before their parents
  if (error instanceof ValidationError) return "validation";
  if (error instanceof HellHubClientStateError) return "client_state";
  if (error instanceof HellHubTimeoutError) return "timeout";
  if (error instanceof HellHubNetworkError) return "network";
  if (error instanceof HellHubHttpError) {
    return error.httpStatus === 404 ? "not_found" : "http";
  }
  if (error instanceof HellHubResponseError) return "invalid_response";
  if (error instanceof HellHubEndpointUnavailableError) return "unavailable";
  if (error instanceof NotFoundError) return "not_found";
  if (error instanceof ConfigurationError) return "configuration";
  return "internal";
}

/**
 * Maps any thrown value to a category and a message suitable for a tool envelope.
 */
export function describeError(error: unknown): ErrorDescription {
  const description: ErrorDescription = {
    kind: classify(error),
    message: extractMessage(error),
  };
  if (error instanceof BaseError) {
    description.code = error.code;
  }
  return description;
}

const RETRYABLE_HTTP_STATUSES = new Set([429, 502, 503, 504]);

/**
 * Transient HellHub failures worth another attempt. A closed client is not one of them.
 */
export function isRetryableHellHubError(error: unknown): boolean {
  if (error instanceof HellHubNetworkError) {
    return true;
  }
  if (error instanceof HellHubHttpError) {
    return RETRYABLE_HTTP_STATUSES.has(error.httpStatus);
  }
  return false;
}

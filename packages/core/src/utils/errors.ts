// pattern: Functional Core

/**
 * Base class for pipewright errors
 * Carries a category so callers can branch without instanceof chains
 */
export abstract class PipewrightError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The transport could not deliver the request (connection refused, DNS, TLS)
 * No response was received, so the request is safe to send again
 */
export class ServiceRequestError extends PipewrightError {
  public readonly url?: string;

  constructor(message: string, url?: string, cause?: unknown) {
    super("request", message, cause);
    if (url) {
      this.url = url;
    }
  }
}

/**
 * The request did not complete within the per-call timeout
 */
export class ServiceRequestTimeoutError extends ServiceRequestError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, url?: string, cause?: unknown) {
    super(message, url, cause);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The request was sent but reading the response failed
 */
export class ServiceResponseError extends PipewrightError {
  public readonly url?: string;

  constructor(message: string, url?: string, cause?: unknown) {
    super("response", message, cause);
    if (url) {
      this.url = url;
    }
  }
}

/**
 * A policy broke its contract with the chain
 * (unlinked `next`, async hook in a synchronous pipeline)
 */
export class PolicyContractError extends PipewrightError {
  public readonly policyName?: string;

  constructor(message: string, policyName?: string) {
    super("policy", message);
    if (policyName) {
      this.policyName = policyName;
    }
  }
}

/**
 * Authentication could not be applied to the request
 */
export class ClientAuthenticationError extends PipewrightError {
  constructor(message: string, cause?: unknown) {
    super("authentication", message, cause);
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends PipewrightError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * Errors related to multipart/mixed batch bodies
 */
export class MultipartError extends PipewrightError {
  constructor(message: string) {
    super("multipart", message);
  }
}

/**
 * Errors related to traffic recordings and their replay
 */
export class RecordingError extends PipewrightError {
  public readonly filePath?: string;

  constructor(message: string, filePath?: string, cause?: unknown) {
    super("recording", message, cause);
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Type guard for any pipewright error
 */
export function isPipewrightError(error: unknown): error is PipewrightError {
  return error instanceof PipewrightError;
}

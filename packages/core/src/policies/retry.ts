// pattern: Mixed (unavoidable)
// Retry decisions are pure; the send loops add sleeping and logging around them

import { setTimeout as delay } from "timers/promises";

import { componentLogger } from "../logger/instance.js";
import {
  takeOption,
  type PipelineContext,
  type PipelineRequest,
  type PipelineResponse,
} from "../pipeline/context.js";
import { sendSettled, sendSettledAsync, type SendResult } from "../pipeline/result.js";
import { AsyncHttpPolicy, HttpPolicy } from "../pipeline/types.js";
import { ServiceRequestError, ServiceResponseError } from "../utils/errors.js";

import type { HttpRequest } from "../http/request.js";
import type { HttpResponse } from "../http/response.js";
import type { Logger } from "pino";

export type RetryMode = "exponential" | "fixed";

export interface RetryPolicyOptions {
  /** Total sends including the first one */
  maxAttempts?: number;
  backoffFactorMs?: number;
  backoffMaxMs?: number;
  mode?: RetryMode;
  statusCodes?: readonly number[];
  logger?: Logger;
}

export const DEFAULT_RETRY_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];
export const DEFAULT_MAX_ATTEMPTS = 4;
export const DEFAULT_BACKOFF_FACTOR_MS = 800;
export const DEFAULT_BACKOFF_MAX_MS = 120_000;

/** Context data key holding how many retries a call needed */
export const RETRY_COUNT_KEY = "retry.count";

const IDEMPOTENT_METHODS = new Set(["GET", "HEAD", "PUT", "DELETE", "OPTIONS", "TRACE"]);
const NON_IDEMPOTENT_SERVER_ERRORS = new Set([500, 503, 504]);

export type RetryDecision =
  | {
      type: "return";
      response: PipelineResponse;
    }
  | {
      type: "throw";
      error: unknown;
    }
  | {
      type: "retry";
      delayMs: number;
      reason: string;
    };

/**
 * Milliseconds to wait according to `retry-after-ms`, `x-ms-retry-after-ms`
 * or `Retry-After` (delta seconds or HTTP-date); undefined when absent or unparseable
 */
export function parseRetryAfterMs(headers: Headers, now: number = Date.now()): number | undefined {
  for (const name of ["retry-after-ms", "x-ms-retry-after-ms"]) {
    const value = headers.get(name);
    if (value !== null && value.trim() !== "") {
      const ms = Number(value);
      if (Number.isFinite(ms) && ms >= 0) {
        return ms;
      }
    }
  }

  const retryAfter = headers.get("retry-after");
  if (retryAfter === null || retryAfter.trim() === "") {
    return undefined;
  }
  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(retryAfter);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }
  return undefined;
}

/**
 * What to do after each attempt, shared by the sync and async policies
 */
export class RetryStrategy {
  readonly maxAttempts: number;
  readonly backoffFactorMs: number;
  readonly backoffMaxMs: number;
  readonly mode: RetryMode;
  readonly statusCodes: ReadonlySet<number>;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    this.backoffFactorMs = options.backoffFactorMs ?? DEFAULT_BACKOFF_FACTOR_MS;
    this.backoffMaxMs = options.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS;
    this.mode = options.mode ?? "exponential";
    this.statusCodes = new Set(options.statusCodes ?? DEFAULT_RETRY_STATUS_CODES);
  }

  /** Attempts for one call; consumes the per-call `retryMaxAttempts` override */
  attemptsFor(context: PipelineContext): number {
    const override = takeOption(context, "retryMaxAttempts");
    if (override === undefined) {
      return this.maxAttempts;
    }
    if (!Number.isInteger(override) || override < 1) {
      throw new RangeError(`retryMaxAttempts must be a positive integer, got ${override}`);
    }
    return override;
  }

  /**
   * Connection failures are always safe to repeat. Failures while reading
   * the response only for idempotent methods. Anything else is not a
   * transport failure.
   */
  isRetryableError(error: unknown, request: HttpRequest): boolean {
    if (error instanceof ServiceRequestError) {
      return true;
    }
    if (error instanceof ServiceResponseError) {
      return IDEMPOTENT_METHODS.has(request.method);
    }
    return false;
  }

  isRetryableResponse(response: HttpResponse): boolean {
    if (!this.statusCodes.has(response.status)) {
      return false;
    }
    const method = response.request.method;
    if ((method === "POST" || method === "PATCH") && NON_IDEMPOTENT_SERVER_ERRORS.has(response.status)) {
      return false;
    }
    return true;
  }

  /** Delay after the `attempt`-th send (1-based) */
  backoffMs(attempt: number): number {
    const delayMs =
      this.mode === "fixed" ? this.backoffFactorMs : this.backoffFactorMs * 2 ** (attempt - 1);
    return Math.min(delayMs, this.backoffMaxMs);
  }

  decide(result: SendResult, request: PipelineRequest, attempt: number, maxAttempts: number): RetryDecision {
    const attemptsLeft = attempt < maxAttempts;

    if (result.ok) {
      const response = result.response.httpResponse;
      if (attemptsLeft && this.isRetryableResponse(response)) {
        return {
          type: "retry",
          delayMs: parseRetryAfterMs(response.headers) ?? this.backoffMs(attempt),
          reason: `status ${response.status}`,
        };
      }
      return { type: "return", response: result.response };
    }

    if (attemptsLeft && this.isRetryableError(result.error, request.httpRequest)) {
      return {
        type: "retry",
        delayMs: this.backoffMs(attempt),
        reason: result.error instanceof Error ? result.error.message : String(result.error),
      };
    }
    return { type: "throw", error: result.error };
  }
}

/**
 * Blocks the thread; the synchronous pipeline has no other way to wait
 */
export function sleepSync(ms: number): void {
  if (ms <= 0) {
    return;
  }
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export interface SyncRetryPolicyOptions extends RetryPolicyOptions {
  sleep?: (ms: number) => void;
}

export interface AsyncRetryPolicyOptions extends RetryPolicyOptions {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Re-sends on transport failures and retryable statuses with backoff
 * Exhausted on errors: throws the last error. Exhausted on statuses: returns the last response.
 */
export class RetryPolicy extends HttpPolicy {
  readonly strategy: RetryStrategy;
  private readonly sleep: (ms: number) => void;
  private readonly logger: Logger;

  constructor(options: SyncRetryPolicyOptions = {}) {
    super("RetryPolicy");
    this.strategy = new RetryStrategy(options);
    this.sleep = options.sleep ?? sleepSync;
    this.logger = componentLogger("retry", options.logger);
  }

  send(request: PipelineRequest): PipelineResponse {
    const maxAttempts = this.strategy.attemptsFor(request.context);

    for (let attempt = 1; ; attempt++) {
      const decision = this.strategy.decide(
        sendSettled(this.next, request),
        request,
        attempt,
        maxAttempts
      );

      switch (decision.type) {
        case "return":
          request.context.data.set(RETRY_COUNT_KEY, attempt - 1);
          return decision.response;
        case "throw":
          request.context.data.set(RETRY_COUNT_KEY, attempt - 1);
          throw decision.error;
        case "retry":
          this.logger.info(
            { attempt, maxAttempts, delayMs: decision.delayMs, reason: decision.reason },
            "Retrying request"
          );
          this.sleep(decision.delayMs);
          break;
      }
    }
  }
}

export class AsyncRetryPolicy extends AsyncHttpPolicy {
  readonly strategy: RetryStrategy;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: AsyncRetryPolicyOptions = {}) {
    super("AsyncRetryPolicy");
    this.strategy = new RetryStrategy(options);
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
    this.logger = componentLogger("retry", options.logger);
  }

  async send(request: PipelineRequest): Promise<PipelineResponse> {
    const maxAttempts = this.strategy.attemptsFor(request.context);

    for (let attempt = 1; ; attempt++) {
      const decision = this.strategy.decide(
        await sendSettledAsync(this.next, request),
        request,
        attempt,
        maxAttempts
      );

      switch (decision.type) {
        case "return":
          request.context.data.set(RETRY_COUNT_KEY, attempt - 1);
          return decision.response;
        case "throw":
          request.context.data.set(RETRY_COUNT_KEY, attempt - 1);
          throw decision.error;
        case "retry":
          this.logger.info(
            { attempt, maxAttempts, delayMs: decision.delayMs, reason: decision.reason },
            "Retrying request"
          );
          await this.sleep(decision.delayMs, request.context.options.abortSignal);
          break;
      }
    }
  }
}

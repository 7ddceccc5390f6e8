// pattern: Imperative Shell

import { BufferedHttpResponse, type HttpResponse } from "../http/response.js";
import { componentLogger } from "../logger/instance.js";
import {
  ServiceRequestError,
  ServiceRequestTimeoutError,
  ServiceResponseError,
} from "../utils/errors.js";

import type { HttpRequest } from "../http/request.js";
import type { TransportOptions } from "../pipeline/context.js";
import type { AsyncHttpTransport } from "../pipeline/types.js";
import type { Logger } from "pino";

export const DEFAULT_TIMEOUT_MS = 300_000;

export interface FetchTransportOptions {
  /** Per-request timeout unless the call sets `timeoutMs` */
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  }
  return String(error);
}

/**
 * Transport over the global fetch
 *
 * Redirects are not followed here; the response body is read fully
 * before `send` resolves.
 */
export class FetchTransport implements AsyncHttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private connected = false;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = componentLogger("fetch-transport", options.logger);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async open(): Promise<void> {
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  async send(request: HttpRequest, options: TransportOptions): Promise<HttpResponse> {
    if (!this.connected) {
      await this.open();
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const callerSignal = options.abortSignal;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const fetchImpl = this.fetchImpl;
    const hasBody = request.method !== "GET" && request.method !== "HEAD";

    try {
      this.logger.debug({ method: request.method, url: request.url }, "Sending request");

      let response: Response;
      try {
        response = await fetchImpl(request.url, {
          method: request.method,
          headers: request.headers,
          body: hasBody ? request.body : undefined,
          redirect: "manual",
          signal: controller.signal,
        });
      } catch (error) {
        throw this.mapError(error, request, timedOut, timeoutMs, callerSignal, "request");
      }

      let body: Uint8Array;
      try {
        body = new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw this.mapError(error, request, timedOut, timeoutMs, callerSignal, "response");
      }

      return new BufferedHttpResponse(request, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body,
      });
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  // Caller cancellation passes through as the caller's own reason
  private mapError(
    error: unknown,
    request: HttpRequest,
    timedOut: boolean,
    timeoutMs: number,
    callerSignal: AbortSignal | undefined,
    phase: "request" | "response"
  ): unknown {
    if (timedOut) {
      return new ServiceRequestTimeoutError(
        `${request.method} ${request.url} timed out after ${timeoutMs} ms`,
        timeoutMs,
        request.url,
        error
      );
    }
    if (callerSignal?.aborted) {
      return error;
    }
    if (phase === "request") {
      return new ServiceRequestError(
        `${request.method} ${request.url} failed: ${describe(error)}`,
        request.url,
        error
      );
    }
    return new ServiceResponseError(
      `Reading the response of ${request.method} ${request.url} failed: ${describe(error)}`,
      request.url,
      error
    );
  }
}

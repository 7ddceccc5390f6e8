// pattern: Imperative Shell

import { componentLogger } from "../logger/instance.js";
import {
  takeOption,
  type PipelineContext,
  type PipelineRequest,
  type PipelineResponse,
} from "../pipeline/context.js";

import type { SansIOPolicy } from "../pipeline/types.js";
import type { Logger } from "pino";

export const REDACTED = "REDACTED";

export const DEFAULT_ALLOWED_HEADER_NAMES: readonly string[] = [
  "x-client-request-id",
  "x-request-id",
  "traceparent",
  "accept",
  "cache-control",
  "connection",
  "content-length",
  "content-type",
  "date",
  "etag",
  "expires",
  "if-match",
  "if-modified-since",
  "if-none-match",
  "if-unmodified-since",
  "last-modified",
  "location",
  "pragma",
  "retry-after",
  "retry-after-ms",
  "server",
  "transfer-encoding",
  "user-agent",
  "www-authenticate",
];

export const DEFAULT_ALLOWED_QUERY_PARAMS: readonly string[] = ["api-version"];

export interface NetworkLoggingPolicyOptions {
  enabled?: boolean;
  allowedHeaderNames?: readonly string[];
  allowedQueryParams?: readonly string[];
  logger?: Logger;
}

/**
 * Logs each request, response and failed send
 * Header values and query parameters outside the allow lists are logged as REDACTED
 */
export class NetworkLoggingPolicy implements SansIOPolicy {
  readonly name = "NetworkLoggingPolicy";
  private readonly enabled: boolean;
  private readonly allowedHeaderNames: ReadonlySet<string>;
  private readonly allowedQueryParams: ReadonlySet<string>;
  private readonly logger: Logger;
  private readonly startTimes = new WeakMap<PipelineContext, number>();

  constructor(options: NetworkLoggingPolicyOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.allowedHeaderNames = new Set(
      (options.allowedHeaderNames ?? DEFAULT_ALLOWED_HEADER_NAMES).map(name => name.toLowerCase())
    );
    this.allowedQueryParams = new Set(
      (options.allowedQueryParams ?? DEFAULT_ALLOWED_QUERY_PARAMS).map(name => name.toLowerCase())
    );
    this.logger = componentLogger("http", options.logger);
  }

  onRequest(request: PipelineRequest): void {
    const enabled = takeOption(request.context, "loggingEnable") ?? this.enabled;
    if (!enabled) {
      return;
    }
    this.startTimes.set(request.context, performance.now());

    const http = request.httpRequest;
    this.logger.info(
      {
        method: http.method,
        url: this.redactUrl(http.url),
        headers: this.redactHeaders(http.headers),
      },
      "Request"
    );
  }

  onResponse(request: PipelineRequest, response: PipelineResponse): void {
    const elapsedMs = this.elapsed(request.context);
    if (elapsedMs === undefined) {
      return;
    }
    const http = response.httpResponse;
    this.logger.info(
      {
        status: http.status,
        url: this.redactUrl(request.httpRequest.url),
        headers: this.redactHeaders(http.headers),
        elapsedMs,
      },
      "Response"
    );
  }

  onException(request: PipelineRequest, error: unknown): void {
    const elapsedMs = this.elapsed(request.context);
    if (elapsedMs === undefined) {
      return;
    }
    this.logger.warn(
      {
        err: error,
        method: request.httpRequest.method,
        url: this.redactUrl(request.httpRequest.url),
        elapsedMs,
      },
      "Request failed"
    );
  }

  redactHeaders(headers: Headers): Record<string, string> {
    const redacted: Record<string, string> = {};
    headers.forEach((value, name) => {
      redacted[name] = this.allowedHeaderNames.has(name) ? value : REDACTED;
    });
    return redacted;
  }

  redactUrl(url: string): string {
    const parsed = new URL(url);
    for (const key of new Set(parsed.searchParams.keys())) {
      if (!this.allowedQueryParams.has(key.toLowerCase())) {
        parsed.searchParams.set(key, REDACTED);
      }
    }
    return parsed.toString();
  }

  // Undefined when logging was off for this call
  private elapsed(context: PipelineContext): number | undefined {
    const start = this.startTimes.get(context);
    if (start === undefined) {
      return undefined;
    }
    return Math.round(performance.now() - start);
  }
}

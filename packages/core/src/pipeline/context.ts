// pattern: Functional Core
// Per-call envelopes threaded through the policy chain

import type { HttpRequest } from "../http/request.js";
import type { HttpResponse } from "../http/response.js";
import type { AsyncHttpTransport, HttpTransport } from "./types.js";

export type TracingAttributeValue = string | number | boolean;

/**
 * Consumed by DistributedTracingPolicy; never reaches the transport
 */
export interface TracingOptions {
  enabled?: boolean;
  spanName?: string;
  attributes?: Record<string, TracingAttributeValue>;
}

export type RawRequestHook = (request: PipelineRequest) => void | Promise<void>;
export type RawResponseHook = (response: PipelineResponse) => void | Promise<void>;

/**
 * Per-call option bag
 *
 * Policies pop the keys they own. The transport runner strips
 * `insecureDomainChange`, `enableCae` and `tracingOptions`; whatever else
 * is left is handed to the transport.
 */
export interface CallOptions {
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  /** Set by redirect handling when a hop changes host */
  insecureDomainChange?: boolean;
  /** Continuous access evaluation for token acquisition */
  enableCae?: boolean;
  tracingOptions?: TracingOptions;
  headers?: Record<string, string>;
  userAgent?: string;
  requestId?: string;
  loggingEnable?: boolean;
  rawRequestHook?: RawRequestHook;
  rawResponseHook?: RawResponseHook;
  retryMaxAttempts?: number;
  permitRedirects?: boolean;
  enforceHttps?: boolean;
  [key: string]: unknown;
}

export type TransportOptions = Readonly<CallOptions>;

/**
 * Remove a key from the option bag and return its value
 */
export function popOption<K extends keyof CallOptions & string>(
  options: CallOptions,
  key: K
): CallOptions[K] {
  const value = options[key];
  Reflect.deleteProperty(options, key);
  return value;
}

/**
 * Read a per-call option that holds for the whole call
 *
 * The first read pops the key from the option bag and keeps its value in
 * `context.consumed`. Later reads in the same call (retried attempts,
 * redirect hops) return the kept value.
 */
export function takeOption<K extends keyof CallOptions & string>(
  context: PipelineContext,
  key: K
): CallOptions[K] {
  if (Object.hasOwn(context.options, key)) {
    const value = popOption(context.options, key);
    context.consumed[key] = value;
    return value;
  }
  return context.consumed[key];
}

/**
 * Option bag plus transport back-reference for one `run`
 * `data` holds per-call policy state (span handles, timings)
 */
export class PipelineContext {
  readonly data = new Map<string, unknown>();
  /** Per-call options already taken out of `options` by takeOption */
  readonly consumed: CallOptions = {};

  constructor(
    readonly transport: HttpTransport | AsyncHttpTransport | undefined,
    readonly options: CallOptions = {}
  ) {}
}

export class PipelineRequest {
  constructor(
    public httpRequest: HttpRequest,
    readonly context: PipelineContext
  ) {}
}

export class PipelineResponse {
  constructor(
    readonly httpRequest: HttpRequest,
    readonly httpResponse: HttpResponse,
    readonly context: PipelineContext
  ) {}
}

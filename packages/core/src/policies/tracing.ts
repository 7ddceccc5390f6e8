// pattern: Imperative Shell

import {
  context as otelContext,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type SpanContext,
  type SpanOptions,
} from "@opentelemetry/api";

import { VERSION } from "../version.js";
import {
  takeOption,
  type PipelineContext,
  type PipelineRequest,
  type PipelineResponse,
  type TracingAttributeValue,
} from "../pipeline/context.js";

import type { SansIOPolicy } from "../pipeline/types.js";

export const DEFAULT_TRACER_NAME = "pipewright";

/**
 * The part of an OpenTelemetry Span this policy uses
 * A real Span satisfies it; so does a hand-written test span
 */
export interface PipelineSpan {
  setAttribute(key: string, value: TracingAttributeValue): unknown;
  setStatus(status: { code: SpanStatusCode; message?: string }): unknown;
  recordException(exception: Error | string): void;
  end(): void;
  spanContext?(): SpanContext;
}

/** Structural subset of an OpenTelemetry Tracer */
export interface PipelineTracer {
  startSpan(name: string, options?: SpanOptions): PipelineSpan;
}

export interface DistributedTracingPolicyOptions {
  tracer?: PipelineTracer;
  tracerName?: string;
  enabled?: boolean;
}

/**
 * One CLIENT span per call, covering retries and redirects below it
 * Trace context is injected into the request headers through the global propagator
 */
export class DistributedTracingPolicy implements SansIOPolicy {
  readonly name = "DistributedTracingPolicy";
  private readonly tracer: PipelineTracer;
  private readonly enabled: boolean;
  private readonly spans = new WeakMap<PipelineContext, PipelineSpan>();

  constructor(options: DistributedTracingPolicyOptions = {}) {
    this.tracer = options.tracer ?? trace.getTracer(options.tracerName ?? DEFAULT_TRACER_NAME, VERSION);
    this.enabled = options.enabled ?? true;
  }

  onRequest(request: PipelineRequest): void {
    const tracingOptions = takeOption(request.context, "tracingOptions") ?? {};
    if (!(tracingOptions.enabled ?? this.enabled)) {
      return;
    }

    const http = request.httpRequest;
    const url = new URL(http.url);
    const attributes: Attributes = {
      "http.request.method": http.method,
      "url.full": url.toString(),
      "server.address": url.hostname,
      ...tracingOptions.attributes,
    };
    if (url.port !== "") {
      attributes["server.port"] = Number(url.port);
    }

    const span = this.tracer.startSpan(tracingOptions.spanName ?? `HTTP ${http.method}`, {
      kind: SpanKind.CLIENT,
      attributes,
    });
    this.spans.set(request.context, span);

    const spanContext = span.spanContext?.();
    if (spanContext) {
      propagation.inject(
        trace.setSpanContext(otelContext.active(), spanContext),
        http.headers,
        {
          set(carrier, key, value) {
            carrier.set(key, value);
          },
        }
      );
    }
  }

  onResponse(request: PipelineRequest, response: PipelineResponse): void {
    const span = this.takeSpan(request.context);
    if (!span) {
      return;
    }
    const status = response.httpResponse.status;
    span.setAttribute("http.response.status_code", status);
    if (status >= 400) {
      span.setAttribute("error.type", String(status));
      span.setStatus({ code: SpanStatusCode.ERROR });
    }
    span.end();
  }

  onException(request: PipelineRequest, error: unknown): void {
    const span = this.takeSpan(request.context);
    if (!span) {
      return;
    }
    if (error instanceof Error) {
      span.recordException(error);
      span.setAttribute("error.type", error.name);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    } else {
      span.recordException(String(error));
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
    }
    span.end();
  }

  private takeSpan(context: PipelineContext): PipelineSpan | undefined {
    const span = this.spans.get(context);
    this.spans.delete(context);
    return span;
  }
}

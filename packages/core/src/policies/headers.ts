// pattern: Functional Core

import { takeOption, type PipelineRequest } from "../pipeline/context.js";

import type { SansIOPolicy } from "../pipeline/types.js";

/**
 * Applies client-wide headers, then the per-call `headers` option on top
 */
export class HeadersPolicy implements SansIOPolicy {
  readonly name = "HeadersPolicy";
  private readonly baseHeaders: Headers;

  constructor(baseHeaders: Record<string, string> = {}) {
    this.baseHeaders = new Headers(baseHeaders);
  }

  /** Add or replace a base header for all later calls */
  addHeader(name: string, value: string): void {
    this.baseHeaders.set(name, value);
  }

  onRequest(request: PipelineRequest): void {
    const { headers } = request.httpRequest;
    this.baseHeaders.forEach((value, name) => {
      headers.set(name, value);
    });

    const perCall = takeOption(request.context, "headers");
    for (const [name, value] of Object.entries(perCall ?? {})) {
      headers.set(name, value);
    }
  }
}

// pattern: Functional Core

import { randomUUID } from "node:crypto";

import { takeOption, type PipelineRequest } from "../pipeline/context.js";

import type { SansIOPolicy } from "../pipeline/types.js";

export const REQUEST_ID_HEADER = "x-client-request-id";

/**
 * Tags every request with a client request id so client and server logs line up
 * An id already on the request wins; otherwise the per-call `requestId`, else a UUID
 */
export class RequestIdPolicy implements SansIOPolicy {
  readonly name = "RequestIdPolicy";

  constructor(private readonly headerName: string = REQUEST_ID_HEADER) {}

  onRequest(request: PipelineRequest): void {
    const perCall = takeOption(request.context, "requestId");
    const { headers } = request.httpRequest;
    if (!headers.has(this.headerName)) {
      headers.set(this.headerName, perCall ?? randomUUID());
    }
  }
}

// pattern: Functional Core

import { MultipartError } from "../utils/errors.js";

import {
  findPartHeader,
  parseHttpResponseMessage,
  parseMultipartBoundary,
  splitMultipartBody,
  type RawHttpResponse,
} from "./multipart.js";
import { flattenMultipartRequests, type HttpRequest } from "./request.js";

/**
 * A received HTTP response
 * Error statuses are ordinary values here; mapping them to errors is the caller's job
 */
export interface HttpResponse {
  readonly request: HttpRequest;
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly body: Uint8Array;
  text(): string;
  json(): unknown;
  /** Sub-responses of a multipart/mixed batch, one per leaf sub-request */
  parts(): HttpResponse[];
}

export interface HttpResponseInit {
  status: number;
  statusText?: string;
  headers?: Headers | Record<string, string>;
  body?: Uint8Array | string;
}

/**
 * Response whose body has been read into memory
 */
export class BufferedHttpResponse implements HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly body: Uint8Array;

  constructor(
    readonly request: HttpRequest,
    init: HttpResponseInit
  ) {
    this.status = init.status;
    this.statusText = init.statusText ?? "";
    this.headers = new Headers(init.headers);
    this.body =
      typeof init.body === "string"
        ? Buffer.from(init.body, "utf8")
        : (init.body ?? new Uint8Array());
  }

  text(): string {
    return Buffer.from(this.body).toString("utf8");
  }

  json(): unknown {
    return JSON.parse(this.text());
  }

  parts(): HttpResponse[] {
    if (!this.request.multipartMixedInfo) {
      throw new MultipartError(
        "Cannot split a response whose request has no multipart/mixed sub-requests"
      );
    }

    const boundary = parseMultipartBoundary(this.headers.get("content-type") ?? "");
    if (!boundary) {
      throw new MultipartError(
        `Expected a multipart/mixed response, got "${this.headers.get("content-type") ?? ""}"`
      );
    }

    const requests = flattenMultipartRequests(this.request);
    const raw = collectHttpParts(this.body, boundary);
    if (raw.length !== requests.length) {
      throw new MultipartError(
        `Batch response has ${raw.length} parts for ${requests.length} sub-requests`
      );
    }

    return requests.map((request, index) => {
      const part = raw[index];
      if (!part) {
        throw new MultipartError(`Missing response part ${index}`);
      }
      return new BufferedHttpResponse(request, part);
    });
  }
}

function collectHttpParts(body: Uint8Array, boundary: string): RawHttpResponse[] {
  return splitMultipartBody(body, boundary).flatMap(part => {
    const nested = parseMultipartBoundary(findPartHeader(part.headers, "content-type") ?? "");
    if (nested) {
      return collectHttpParts(part.payload, nested);
    }
    return [parseHttpResponseMessage(part.payload)];
  });
}

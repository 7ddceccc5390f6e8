// pattern: Functional Core

import { randomUUID } from "node:crypto";

import { serializeMultipartBody, type MimePart } from "./multipart.js";

import type { CallOptions } from "../pipeline/context.js";
import type { SansIOPolicy } from "../pipeline/types.js";

export type RequestBody = string | Uint8Array;

export type QueryValue = string | number | boolean;

/**
 * Sub-requests bundled into one multipart/mixed request, with the policies
 * whose onRequest hooks prepare each part before serialization
 */
export interface MultipartMixedInfo {
  requests: HttpRequest[];
  policies: SansIOPolicy[];
  boundary: string | undefined;
  options: CallOptions;
}

export interface HttpRequestInit {
  headers?: Record<string, string>;
  body?: RequestBody;
  /** Serialized with JSON.stringify; wins over `body` */
  json?: unknown;
  params?: Record<string, QueryValue>;
}

export interface MultipartMixedOptions {
  policies?: SansIOPolicy[];
  boundary?: string;
  /** Seeds the option bag of every part's context */
  options?: CallOptions;
}

/**
 * An outbound HTTP request
 * Owned by the caller until handed to a pipeline; policies may mutate it
 */
export class HttpRequest {
  method: string;
  url: string;
  headers: Headers;
  body: RequestBody | undefined;
  multipartMixedInfo: MultipartMixedInfo | undefined;

  constructor(method: string, url: string, init: HttpRequestInit = {}) {
    this.method = method.toUpperCase();
    this.url = url;
    this.headers = new Headers(init.headers);
    this.body = undefined;
    this.multipartMixedInfo = undefined;

    if (init.params) {
      const target = new URL(url);
      for (const [key, value] of Object.entries(init.params)) {
        target.searchParams.append(key, String(value));
      }
      this.url = target.toString();
    }

    if (init.json !== undefined) {
      this.setJsonBody(init.json);
    } else if (init.body !== undefined) {
      if (typeof init.body === "string") {
        this.setTextBody(init.body);
      } else {
        this.setBytesBody(init.body);
      }
    }
  }

  setJsonBody(value: unknown): void {
    if (!this.headers.has("content-type")) {
      this.headers.set("content-type", "application/json");
    }
    this.setTextBody(JSON.stringify(value));
  }

  setTextBody(text: string): void {
    this.body = text;
    this.headers.set("content-length", String(Buffer.byteLength(text, "utf8")));
  }

  setBytesBody(bytes: Uint8Array): void {
    this.body = bytes;
    this.headers.set("content-length", String(bytes.byteLength));
  }

  /** The body as bytes, empty when there is none */
  bodyBytes(): Uint8Array {
    if (this.body === undefined) {
      return new Uint8Array();
    }
    return typeof this.body === "string" ? Buffer.from(this.body, "utf8") : this.body;
  }

  clone(): HttpRequest {
    const copy = new HttpRequest(this.method, this.url, {
      headers: Object.fromEntries(this.headers),
    });
    copy.body =
      this.body === undefined || typeof this.body === "string"
        ? this.body
        : new Uint8Array(this.body);
    if (this.multipartMixedInfo) {
      copy.multipartMixedInfo = {
        ...this.multipartMixedInfo,
        requests: this.multipartMixedInfo.requests.map(part => part.clone()),
      };
    }
    return copy;
  }

  /**
   * Mark this request as a batch of sub-requests
   * The body is built later by prepareMultipartBody()
   */
  setMultipartMixed(
    requests: HttpRequest[],
    options: MultipartMixedOptions = {}
  ): void {
    this.multipartMixedInfo = {
      requests,
      policies: options.policies ?? [],
      boundary: options.boundary,
      options: options.options ?? {},
    };
  }

  /**
   * Serialize the sub-requests into a multipart/mixed body
   * Content-IDs run on from `contentIndex` across nested changesets
   *
   * @returns the next unused Content-ID
   */
  prepareMultipartBody(contentIndex = 0): number {
    const info = this.multipartMixedInfo;
    if (!info) {
      return contentIndex;
    }

    const boundary = info.boundary ?? `batch_${randomUUID()}`;
    const parts: MimePart[] = [];
    let index = contentIndex;

    for (const part of info.requests) {
      if (part.multipartMixedInfo) {
        index = part.prepareMultipartBody(index);
        parts.push({
          headers: [["Content-Type", part.headers.get("content-type") ?? ""]],
          payload: part.bodyBytes(),
        });
      } else {
        parts.push({
          headers: [
            ["Content-Type", "application/http"],
            ["Content-Transfer-Encoding", "binary"],
            ["Content-ID", String(index)],
          ],
          payload: part.serialize(),
        });
        index += 1;
      }
    }

    this.setBytesBody(serializeMultipartBody(parts, boundary));
    this.headers.set("content-type", `multipart/mixed; boundary=${boundary}`);
    return index;
  }

  /**
   * HTTP/1.1 wire form: request line with path and query, headers, blank line, body
   */
  serialize(): Uint8Array {
    const target = new URL(this.url);
    const lines = [`${this.method} ${target.pathname}${target.search} HTTP/1.1`];
    this.headers.forEach((value, name) => {
      lines.push(`${name}: ${value}`);
    });
    const head = Buffer.from(`${lines.join("\r\n")}\r\n\r\n`, "latin1");
    return Buffer.concat([head, this.bodyBytes()]);
  }
}

/**
 * Leaf sub-requests in serialization order, descending into changesets
 */
export function flattenMultipartRequests(request: HttpRequest): HttpRequest[] {
  const info = request.multipartMixedInfo;
  if (!info) {
    return [];
  }
  return info.requests.flatMap(part =>
    part.multipartMixedInfo ? flattenMultipartRequests(part) : [part]
  );
}

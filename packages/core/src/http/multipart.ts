// pattern: Functional Core
// multipart/mixed framing for batch requests and their responses

import { MultipartError } from "../utils/errors.js";

const CRLF = "\r\n";
const HEADER_SEPARATOR = Buffer.from(`${CRLF}${CRLF}`);

/**
 * One MIME part: its own headers plus an opaque payload
 */
export interface MimePart {
  headers: Array<[string, string]>;
  payload: Uint8Array;
}

/**
 * A status line, headers and body parsed out of an application/http part
 */
export interface RawHttpResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: Uint8Array;
}

/**
 * Join parts into a multipart body:
 * each part is `--boundary`, its headers, a blank line, the payload and CRLF;
 * the body closes with `--boundary--` and CRLF
 */
export function serializeMultipartBody(
  parts: readonly MimePart[],
  boundary: string
): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const head = [`--${boundary}`];
    for (const [name, value] of part.headers) {
      head.push(`${name}: ${value}`);
    }
    chunks.push(Buffer.from(`${head.join(CRLF)}${CRLF}${CRLF}`));
    chunks.push(Buffer.from(part.payload));
    chunks.push(Buffer.from(CRLF));
  }
  chunks.push(Buffer.from(`--${boundary}--${CRLF}`));
  return Buffer.concat(chunks);
}

/**
 * Extract the boundary parameter of a multipart/mixed content type
 * Returns undefined for any other media type
 */
export function parseMultipartBoundary(contentType: string): string | undefined {
  const [mediaType, ...params] = contentType.split(";");
  if (mediaType?.trim().toLowerCase() !== "multipart/mixed") {
    return undefined;
  }

  for (const param of params) {
    const eq = param.indexOf("=");
    if (eq === -1) {
      continue;
    }
    if (param.slice(0, eq).trim().toLowerCase() === "boundary") {
      return param
        .slice(eq + 1)
        .trim()
        .replace(/^"(.*)"$/, "$1");
    }
  }

  return undefined;
}

/**
 * Split a multipart body back into its parts
 * The CRLF that precedes each delimiter belongs to the delimiter and is dropped
 */
export function splitMultipartBody(
  body: Uint8Array,
  boundary: string
): MimePart[] {
  const buffer = Buffer.from(body);
  const delimiter = Buffer.from(`--${boundary}`);
  const parts: MimePart[] = [];

  let position = buffer.indexOf(delimiter);
  if (position === -1) {
    throw new MultipartError(`Boundary "${boundary}" not found in body`);
  }

  while (position !== -1) {
    const start = position + delimiter.length;
    if (buffer.subarray(start, start + 2).toString("latin1") === "--") {
      return parts;
    }

    const next = buffer.indexOf(delimiter, start);
    if (next === -1) {
      throw new MultipartError(
        `Multipart body for boundary "${boundary}" is not terminated`
      );
    }

    parts.push(parseMimePart(trimDelimiterCrlf(buffer.subarray(start, next))));
    position = next;
  }

  return parts;
}

/**
 * Parse `HTTP/1.1 <status> <reason>`, headers and body from a part payload
 */
export function parseHttpResponseMessage(payload: Uint8Array): RawHttpResponse {
  const buffer = Buffer.from(payload);
  const split = buffer.indexOf(HEADER_SEPARATOR);
  const headBlock =
    split === -1 ? buffer.toString("latin1") : buffer.subarray(0, split).toString("latin1");
  const body =
    split === -1 ? new Uint8Array() : buffer.subarray(split + HEADER_SEPARATOR.length);

  const [statusLine = "", ...headerLines] = headBlock.split(CRLF);
  const match = /^HTTP\/\d(?:\.\d)?\s+(\d{3})(?:\s+(.*))?$/.exec(statusLine.trim());
  if (!match?.[1]) {
    throw new MultipartError(`Invalid HTTP status line in part: "${statusLine}"`);
  }

  const headers = new Headers();
  for (const [name, value] of parseHeaderLines(headerLines)) {
    headers.append(name, value);
  }

  return {
    status: Number(match[1]),
    statusText: match[2] ?? "",
    headers,
    body: new Uint8Array(body),
  };
}

function parseMimePart(segment: Buffer): MimePart {
  // No part headers: the blank line follows the delimiter line directly
  if (segment.subarray(0, 2).toString("latin1") === CRLF) {
    return { headers: [], payload: new Uint8Array(segment.subarray(2)) };
  }

  const split = segment.indexOf(HEADER_SEPARATOR);
  if (split === -1) {
    return {
      headers: parseHeaderLines(segment.toString("latin1").split(CRLF)),
      payload: new Uint8Array(),
    };
  }

  return {
    headers: parseHeaderLines(segment.subarray(0, split).toString("latin1").split(CRLF)),
    payload: new Uint8Array(segment.subarray(split + HEADER_SEPARATOR.length)),
  };
}

function parseHeaderLines(lines: readonly string[]): Array<[string, string]> {
  const headers: Array<[string, string]> = [];
  for (const line of lines) {
    const colon = line.indexOf(":");
    if (colon <= 0) {
      continue;
    }
    headers.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
  }
  return headers;
}

function trimDelimiterCrlf(segment: Buffer): Buffer {
  let start = 0;
  let end = segment.length;
  if (segment.subarray(0, 2).toString("latin1") === CRLF) {
    start = 2;
  }
  if (end - start >= 2 && segment.subarray(end - 2, end).toString("latin1") === CRLF) {
    end -= 2;
  }
  return segment.subarray(start, end);
}

/**
 * Case-insensitive lookup in a part's header list
 */
export function findPartHeader(
  headers: ReadonlyArray<[string, string]>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
}

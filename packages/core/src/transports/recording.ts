// pattern: Functional Core
// JSONL recording format shared by TrafficRecorderPolicy and the replay transports

import { type Static, Type } from "@sinclair/typebox";

import { BufferedHttpResponse, type HttpResponse } from "../http/response.js";
import { ajv, formatValidationErrors } from "../utils/ajv.js";
import { RecordingError } from "../utils/errors.js";

import type { HttpRequest } from "../http/request.js";

export const RecordedBody = Type.Object({
  content: Type.String(),
  encoding: Type.Union([Type.Literal("utf8"), Type.Literal("base64")]),
});
export type RecordedBody = Static<typeof RecordedBody>;

export const RecordedRequest = Type.Object({
  method: Type.String({ minLength: 1 }),
  url: Type.String({ format: "uri" }),
  headers: Type.Record(Type.String(), Type.String()),
  body: Type.Optional(RecordedBody),
});
export type RecordedRequest = Static<typeof RecordedRequest>;

export const RecordedResponse = Type.Object({
  status: Type.Integer({ minimum: 100, maximum: 599 }),
  statusText: Type.String(),
  headers: Type.Record(Type.String(), Type.String()),
  body: RecordedBody,
});
export type RecordedResponse = Static<typeof RecordedResponse>;

/**
 * One line of a recording: the request plus either its response or the send error
 */
export const RecordedExchange = Type.Object({
  timestamp: Type.String({ format: "date-time" }),
  request: RecordedRequest,
  response: Type.Optional(RecordedResponse),
  error: Type.Optional(Type.String()),
});
export type RecordedExchange = Static<typeof RecordedExchange>;

const validateRecordedExchange = ajv.compile<RecordedExchange>(RecordedExchange);

/** Credentials never reach the recording file */
export const RECORDING_REDACTED_HEADERS: ReadonlySet<string> = new Set([
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
]);

export function encodeBody(bytes: Uint8Array): RecordedBody {
  const buffer = Buffer.from(bytes);
  const text = buffer.toString("utf8");
  if (Buffer.from(text, "utf8").equals(buffer)) {
    return { content: text, encoding: "utf8" };
  }
  return { content: buffer.toString("base64"), encoding: "base64" };
}

export function decodeBody(body: RecordedBody): Uint8Array {
  return Buffer.from(body.content, body.encoding);
}

export function recordHeaders(headers: Headers): Record<string, string> {
  const recorded: Record<string, string> = {};
  headers.forEach((value, name) => {
    recorded[name] = RECORDING_REDACTED_HEADERS.has(name) ? "REDACTED" : value;
  });
  return recorded;
}

/** Key responses are queued under during replay */
export function exchangeKey(method: string, url: string): string {
  return `${method.toUpperCase()} ${new URL(url).toString()}`;
}

/**
 * Parse and validate a JSONL recording; blank lines are skipped
 */
export function parseRecording(content: string, filePath?: string): RecordedExchange[] {
  const exchanges: RecordedExchange[] = [];
  const lines = content.split("\n");

  lines.forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    const lineNumber = index + 1;
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      throw new RecordingError(`Invalid JSON on line ${lineNumber}`, filePath, error);
    }
    if (!validateRecordedExchange(data)) {
      const messages = formatValidationErrors(validateRecordedExchange.errors);
      throw new RecordingError(
        `Invalid recording entry on line ${lineNumber}: ${messages.join(", ")}`,
        filePath
      );
    }
    exchanges.push(data);
  });

  return exchanges;
}

/**
 * Serves recorded responses in order, one queue per `METHOD url`
 * Entries that recorded a send error have no response and are skipped
 */
export class RecordingReplayer {
  private readonly queues = new Map<string, RecordedResponse[]>();

  constructor(
    exchanges: readonly RecordedExchange[],
    private readonly filePath?: string
  ) {
    for (const exchange of exchanges) {
      if (!exchange.response) {
        continue;
      }
      const key = exchangeKey(exchange.request.method, exchange.request.url);
      const queue = this.queues.get(key) ?? [];
      queue.push(exchange.response);
      this.queues.set(key, queue);
    }
  }

  get remaining(): number {
    let count = 0;
    for (const queue of this.queues.values()) {
      count += queue.length;
    }
    return count;
  }

  take(request: HttpRequest): HttpResponse {
    const key = exchangeKey(request.method, request.url);
    const recorded = this.queues.get(key)?.shift();
    if (!recorded) {
      throw new RecordingError(`No recorded response left for ${key}`, this.filePath);
    }
    return new BufferedHttpResponse(request, {
      status: recorded.status,
      statusText: recorded.statusText,
      headers: recorded.headers,
      body: decodeBody(recorded.body),
    });
  }
}

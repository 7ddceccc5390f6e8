// pattern: Imperative Shell
// In-process transports that record what reached them

import { BufferedHttpResponse, type HttpResponse, type HttpResponseInit } from "../http/response.js";

import type { HttpRequest } from "../http/request.js";
import type { TransportOptions } from "../pipeline/context.js";
import type { AsyncHttpTransport, HttpTransport } from "../pipeline/types.js";

/** What the fake answers: a response shape, or an error to throw */
export type FakeReply = HttpResponseInit | Error;

export type FakeHandler = (request: HttpRequest, options: TransportOptions) => FakeReply;

export interface SentRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string;
  options: Record<string, unknown>;
}

function snapshotRequest(request: HttpRequest, options: TransportOptions): SentRequest {
  const headers: Record<string, string> = {};
  request.headers.forEach((value, name) => {
    headers[name] = value;
  });
  return {
    method: request.method,
    url: request.url,
    headers,
    body: Buffer.from(request.bodyBytes()).toString("utf8"),
    options: { ...options },
  };
}

/**
 * Replies from a queue; the last reply repeats once the queue is down to one
 */
export function queuedReplies(...replies: FakeReply[]): FakeHandler {
  const queue = [...replies];
  return () => {
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new Error("No fake reply configured");
    }
    return reply;
  };
}

class FakeTransportState {
  readonly sent: SentRequest[] = [];
  openCount = 0;
  closeCount = 0;

  constructor(private readonly handler: FakeHandler) {}

  reply(request: HttpRequest, options: TransportOptions): HttpResponse {
    this.sent.push(snapshotRequest(request, options));
    const reply = this.handler(request, options);
    if (reply instanceof Error) {
      throw reply;
    }
    return new BufferedHttpResponse(request, reply);
  }
}

export class FakeTransport implements HttpTransport {
  private readonly state: FakeTransportState;

  constructor(handler: FakeHandler = () => ({ status: 200 })) {
    this.state = new FakeTransportState(handler);
  }

  get sent(): SentRequest[] {
    return this.state.sent;
  }

  get openCount(): number {
    return this.state.openCount;
  }

  get closeCount(): number {
    return this.state.closeCount;
  }

  open(): void {
    this.state.openCount++;
  }

  close(): void {
    this.state.closeCount++;
  }

  send(request: HttpRequest, options: TransportOptions): HttpResponse {
    return this.state.reply(request, options);
  }
}

export class AsyncFakeTransport implements AsyncHttpTransport {
  private readonly state: FakeTransportState;

  constructor(handler: FakeHandler = () => ({ status: 200 })) {
    this.state = new FakeTransportState(handler);
  }

  get sent(): SentRequest[] {
    return this.state.sent;
  }

  get openCount(): number {
    return this.state.openCount;
  }

  get closeCount(): number {
    return this.state.closeCount;
  }

  async open(): Promise<void> {
    this.state.openCount++;
  }

  async close(): Promise<void> {
    this.state.closeCount++;
  }

  async send(request: HttpRequest, options: TransportOptions): Promise<HttpResponse> {
    return this.state.reply(request, options);
  }
}

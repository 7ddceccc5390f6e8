// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { HttpRequest } from "../http/request.js";
import { AsyncPipeline, Pipeline } from "../pipeline/pipeline.js";
import { createMemoryLogger } from "../test-utils/logger.js";
import { AsyncFakeTransport, FakeTransport, queuedReplies } from "../test-utils/transports.js";
import { ServiceRequestError, ServiceResponseError } from "../utils/errors.js";

import { AsyncRetryPolicy, parseRetryAfterMs, RETRY_COUNT_KEY, RetryPolicy, RetryStrategy } from "./retry.js";

function recordSleeps(): { sleeps: number[]; sleep: (ms: number) => void } {
  const sleeps: number[] = [];
  return { sleeps, sleep: ms => sleeps.push(ms) };
}

describe("parseRetryAfterMs", () => {
  const now = Date.parse("2026-01-01T00:00:00Z");

  it("should prefer retry-after-ms", () => {
    const headers = new Headers({ "retry-after-ms": "250", "retry-after": "9" });
    expect(parseRetryAfterMs(headers, now)).toBe(250);
  });

  it("should read x-ms-retry-after-ms", () => {
    expect(parseRetryAfterMs(new Headers({ "x-ms-retry-after-ms": "40" }), now)).toBe(40);
  });

  it("should read Retry-After seconds", () => {
    expect(parseRetryAfterMs(new Headers({ "retry-after": "3" }), now)).toBe(3000);
  });

  it("should read a Retry-After HTTP date", () => {
    const headers = new Headers({ "retry-after": "Thu, 01 Jan 2026 00:00:05 GMT" });
    expect(parseRetryAfterMs(headers, now)).toBe(5000);
  });

  it("should ignore a date in the past and garbage", () => {
    expect(parseRetryAfterMs(new Headers({ "retry-after": "Wed, 31 Dec 2025 23:59:00 GMT" }), now)).toBe(0);
    expect(parseRetryAfterMs(new Headers({ "retry-after": "soon" }), now)).toBeUndefined();
    expect(parseRetryAfterMs(new Headers(), now)).toBeUndefined();
  });
});

describe("RetryStrategy", () => {
  it("should double the backoff and cap it", () => {
    const strategy = new RetryStrategy({ backoffFactorMs: 100, backoffMaxMs: 350 });
    expect([1, 2, 3, 4].map(n => strategy.backoffMs(n))).toEqual([100, 200, 350, 350]);
  });

  it("should keep the backoff flat in fixed mode", () => {
    const strategy = new RetryStrategy({ backoffFactorMs: 100, mode: "fixed" });
    expect([1, 2, 3].map(n => strategy.backoffMs(n))).toEqual([100, 100, 100]);
  });

  it("should reject a non-positive attempt count", () => {
    expect(() => new RetryStrategy({ maxAttempts: 0 })).toThrow(
      "maxAttempts must be a positive integer, got 0"
    );
  });

  it("should retry response read failures only for idempotent methods", () => {
    const strategy = new RetryStrategy();
    const failure = new ServiceResponseError("reset");
    expect(strategy.isRetryableError(failure, new HttpRequest("PUT", "https://example.test/"))).toBe(true);
    expect(strategy.isRetryableError(failure, new HttpRequest("POST", "https://example.test/"))).toBe(false);
    expect(
      strategy.isRetryableError(new ServiceRequestError("refused"), new HttpRequest("POST", "https://example.test/"))
    ).toBe(true);
    expect(strategy.isRetryableError(new Error("bug"), new HttpRequest("GET", "https://example.test/"))).toBe(false);
  });
});

describe("RetryPolicy", () => {
  it("should retry retryable statuses until success", () => {
    const { sleeps, sleep } = recordSleeps();
    const memory = createMemoryLogger();
    const transport = new FakeTransport(queuedReplies({ status: 503 }, { status: 429 }, { status: 200 }));
    const pipeline = new Pipeline(transport, [
      new RetryPolicy({ backoffFactorMs: 10, sleep, logger: memory.logger }),
    ]);

    const response = pipeline.run(new HttpRequest("GET", "https://example.test/"));

    expect(response.httpResponse.status).toBe(200);
    expect(transport.sent).toHaveLength(3);
    expect(sleeps).toEqual([10, 20]);
    expect(response.context.data.get(RETRY_COUNT_KEY)).toBe(2);
    expect(memory.messages("Retrying request").map(line => line["reason"])).toEqual([
      "status 503",
      "status 429",
    ]);
  });

  it("should return the last response once attempts run out", () => {
    const { sleeps, sleep } = recordSleeps();
    const transport = new FakeTransport(() => ({ status: 502 }));
    const pipeline = new Pipeline(transport, [new RetryPolicy({ maxAttempts: 3, backoffFactorMs: 1, sleep })]);

    const response = pipeline.run(new HttpRequest("GET", "https://example.test/"));

    expect(response.httpResponse.status).toBe(502);
    expect(transport.sent).toHaveLength(3);
    expect(sleeps).toEqual([1, 2]);
  });

  it("should throw the last error once attempts run out", () => {
    const { sleep } = recordSleeps();
    let calls = 0;
    const transport = new FakeTransport(() => new ServiceRequestError(`refused ${++calls}`));
    const pipeline = new Pipeline(transport, [new RetryPolicy({ maxAttempts: 2, sleep })]);

    expect(() => pipeline.run(new HttpRequest("GET", "https://example.test/"))).toThrow("refused 2");
    expect(transport.sent).toHaveLength(2);
  });

  it("should not retry errors that are not transport failures", () => {
    const { sleeps, sleep } = recordSleeps();
    const transport = new FakeTransport(() => new TypeError("bad header"));
    const pipeline = new Pipeline(transport, [new RetryPolicy({ sleep })]);

    expect(() => pipeline.run(new HttpRequest("GET", "https://example.test/"))).toThrow("bad header");
    expect(transport.sent).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("should not retry POST on 503", () => {
    const { sleep } = recordSleeps();
    const transport = new FakeTransport(() => ({ status: 503 }));
    const pipeline = new Pipeline(transport, [new RetryPolicy({ sleep })]);

    const response = pipeline.run(new HttpRequest("POST", "https://example.test/", { body: "x" }));

    expect(response.httpResponse.status).toBe(503);
    expect(transport.sent).toHaveLength(1);
  });

  it("should still retry POST on 429", () => {
    const { sleep } = recordSleeps();
    const transport = new FakeTransport(queuedReplies({ status: 429 }, { status: 201 }));
    const pipeline = new Pipeline(transport, [new RetryPolicy({ sleep })]);

    const response = pipeline.run(new HttpRequest("POST", "https://example.test/", { body: "x" }));

    expect(response.httpResponse.status).toBe(201);
    expect(transport.sent).toHaveLength(2);
  });

  it("should wait as long as Retry-After asks", () => {
    const { sleeps, sleep } = recordSleeps();
    const transport = new FakeTransport(
      queuedReplies({ status: 429, headers: { "retry-after": "2" } }, { status: 200 })
    );
    const pipeline = new Pipeline(transport, [new RetryPolicy({ sleep })]);

    pipeline.run(new HttpRequest("GET", "https://example.test/"));

    expect(sleeps).toEqual([2000]);
  });

  it("should honor the per-call attempt count and keep it from the transport", () => {
    const { sleep } = recordSleeps();
    const transport = new FakeTransport(() => ({ status: 500 }));
    const pipeline = new Pipeline(transport, [new RetryPolicy({ sleep })]);

    pipeline.run(new HttpRequest("GET", "https://example.test/"), { retryMaxAttempts: 1 });

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0]?.options).toEqual({});
  });
});

describe("AsyncRetryPolicy", () => {
  it("should retry a refused connection and pass the abort signal to sleep", async () => {
    const controller = new AbortController();
    const signals: Array<AbortSignal | undefined> = [];
    const transport = new AsyncFakeTransport(
      queuedReplies(new ServiceRequestError("refused"), { status: 200, body: "ok" })
    );
    const pipeline = new AsyncPipeline(transport, [
      new AsyncRetryPolicy({
        backoffFactorMs: 5,
        sleep: async (_ms, signal) => {
          signals.push(signal);
        },
      }),
    ]);

    const response = await pipeline.run(new HttpRequest("GET", "https://example.test/"), {
      abortSignal: controller.signal,
    });

    expect(response.httpResponse.text()).toBe("ok");
    expect(response.context.data.get(RETRY_COUNT_KEY)).toBe(1);
    expect(signals).toEqual([controller.signal]);
  });

  it("should send exactly maxAttempts times when the transport keeps failing", async () => {
    let calls = 0;
    const transport = new AsyncFakeTransport(() => new ServiceRequestError(`refused ${++calls}`));
    const pipeline = new AsyncPipeline(transport, [
      new AsyncRetryPolicy({ maxAttempts: 4, sleep: async () => undefined }),
    ]);

    await expect(pipeline.run(new HttpRequest("GET", "https://example.test/"))).rejects.toThrow(
      "refused 4"
    );
    expect(transport.sent).toHaveLength(4);
  });

  it("should keep a per-call attempt count across attempts", async () => {
    const transport = new AsyncFakeTransport(() => ({ status: 503 }));
    const pipeline = new AsyncPipeline(transport, [
      new AsyncRetryPolicy({ maxAttempts: 5, sleep: async () => undefined }),
    ]);

    const response = await pipeline.run(new HttpRequest("GET", "https://example.test/"), {
      retryMaxAttempts: 2,
    });

    expect(response.httpResponse.status).toBe(503);
    expect(transport.sent).toHaveLength(2);
  });
});

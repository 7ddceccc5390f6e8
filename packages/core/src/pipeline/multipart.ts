// pattern: Functional Core
// Prepare phase for batch requests: run sub-policy onRequest hooks on every
// part before the composite body is serialized

import { PipelineContext, PipelineRequest } from "./context.js";
import { requireSyncHook } from "./runners.js";

import type { HttpRequest } from "../http/request.js";

export const DEFAULT_MULTIPART_CONCURRENCY = 4;

export function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Multipart concurrency must be a positive integer, got ${concurrency}`
    );
  }
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight
 * A failing lane stops, the others keep draining the queue; the first
 * failure is rethrown once every lane has settled
 */
async function runBounded<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  const queue = items.values();
  const lane = async (): Promise<void> => {
    // All lanes pull from the same iterator
    for (const item of queue) {
      await worker(item);
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, lane);
  const outcomes = await Promise.allSettled(lanes);
  const failure = outcomes.find(
    (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected"
  );
  if (failure) {
    throw failure.reason;
  }
}

export async function prepareMultipartMixedRequest(
  request: HttpRequest,
  concurrency = DEFAULT_MULTIPART_CONCURRENCY
): Promise<void> {
  const info = request.multipartMixedInfo;
  if (!info) {
    return;
  }
  assertConcurrency(concurrency);

  await runBounded(info.requests, concurrency, async part => {
    // Changesets are prepared part by part as well
    await prepareMultipartMixedRequest(part, concurrency);
    const pipelineRequest = new PipelineRequest(
      part,
      new PipelineContext(undefined, { ...info.options })
    );
    for (const policy of info.policies) {
      await policy.onRequest?.(pipelineRequest);
    }
  });
}

/**
 * Synchronous form; parts are prepared one after another
 */
export function prepareMultipartMixedRequestSync(request: HttpRequest): void {
  const info = request.multipartMixedInfo;
  if (!info) {
    return;
  }

  for (const part of info.requests) {
    prepareMultipartMixedRequestSync(part);
    const pipelineRequest = new PipelineRequest(
      part,
      new PipelineContext(undefined, { ...info.options })
    );
    for (const policy of info.policies) {
      requireSyncHook(policy.onRequest?.(pipelineRequest), policy, "onRequest");
    }
  }
}

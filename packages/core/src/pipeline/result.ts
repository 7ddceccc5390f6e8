// pattern: Functional Core
// Downstream sends as values, so chaining policies branch on a result
// instead of using try/catch for control flow

import type { PipelineRequest, PipelineResponse } from "./context.js";
import type { AsyncHttpPolicy, HttpPolicy } from "./types.js";

export type SendResult =
  | {
      ok: true;
      response: PipelineResponse;
    }
  | {
      ok: false;
      error: unknown;
    };

export function sendSettled(next: HttpPolicy, request: PipelineRequest): SendResult {
  try {
    return { ok: true, response: next.send(request) };
  } catch (error) {
    return { ok: false, error };
  }
}

export async function sendSettledAsync(
  next: AsyncHttpPolicy,
  request: PipelineRequest
): Promise<SendResult> {
  try {
    return { ok: true, response: await next.send(request) };
  } catch (error) {
    return { ok: false, error };
  }
}

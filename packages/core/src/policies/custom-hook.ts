// pattern: Functional Core

import {
  takeOption,
  type PipelineContext,
  type PipelineRequest,
  type PipelineResponse,
  type RawRequestHook,
  type RawResponseHook,
} from "../pipeline/context.js";

import type { HookResult, SansIOPolicy } from "../pipeline/types.js";

export interface CustomHookPolicyOptions {
  rawRequestHook?: RawRequestHook;
  rawResponseHook?: RawResponseHook;
}

/**
 * Lets callers see the raw request just before it leaves and the raw
 * response as soon as it comes back. Per-call hooks replace the
 * constructor's for that call.
 */
export class CustomHookPolicy implements SansIOPolicy {
  readonly name = "CustomHookPolicy";
  private readonly responseHooks = new WeakMap<PipelineContext, RawResponseHook>();

  constructor(private readonly hooks: CustomHookPolicyOptions = {}) {}

  onRequest(request: PipelineRequest): HookResult {
    const requestHook =
      takeOption(request.context, "rawRequestHook") ?? this.hooks.rawRequestHook;
    const responseHook =
      takeOption(request.context, "rawResponseHook") ?? this.hooks.rawResponseHook;

    if (responseHook) {
      this.responseHooks.set(request.context, responseHook);
    }
    return requestHook?.(request);
  }

  onResponse(request: PipelineRequest, response: PipelineResponse): HookResult {
    return this.responseHooks.get(request.context)?.(response);
  }
}

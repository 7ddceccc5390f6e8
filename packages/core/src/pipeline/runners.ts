// pattern: Functional Core
// Adapters that let simple policies and the transport sit in the chain

import { PolicyContractError } from "../utils/errors.js";

import {
  PipelineResponse,
  type CallOptions,
  type PipelineRequest,
  type TransportOptions,
} from "./context.js";
import { sendSettled, sendSettledAsync } from "./result.js";
import {
  AsyncHttpPolicy,
  HttpPolicy,
  policyName,
  type AsyncHttpTransport,
  type HookResult,
  type HttpTransport,
  type SansIOPolicy,
} from "./types.js";

/**
 * Pipeline-internal signalling keys the transport does not understand:
 * - insecureDomainChange: the send goes to a host other than the call's
 *   original one; tells sensitive header cleanup to strip credentials
 * - enableCae: forwarded to TokenCredential.getToken by the bearer policy
 * - tracingOptions: consumed by the tracing policy
 */
export const TRANSPORT_INCOMPATIBLE_OPTIONS = [
  "insecureDomainChange",
  "enableCae",
  "tracingOptions",
] as const;

/**
 * Copy of the option bag without the pipeline-internal keys
 * The context keeps them for later attempts of the same call
 */
export function optionsForTransport(options: CallOptions): TransportOptions {
  const copy: CallOptions = { ...options };
  for (const key of TRANSPORT_INCOMPATIBLE_OPTIONS) {
    Reflect.deleteProperty(copy, key);
  }
  return copy;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * A synchronous pipeline cannot wait on a hook; reject hooks that return promises
 */
export function requireSyncHook(
  result: HookResult,
  policy: SansIOPolicy,
  hook: keyof SansIOPolicy
): void {
  if (isPromiseLike(result)) {
    const name = policyName(policy);
    throw new PolicyContractError(
      `${name}.${hook} returned a promise; asynchronous policies need AsyncPipeline`,
      name
    );
  }
}

/**
 * Runs a simple policy's hooks around the downstream send:
 * onRequest, then next.send, then exactly one of onResponse or onException
 */
export class SansIOPolicyRunner extends HttpPolicy {
  constructor(private readonly policy: SansIOPolicy) {
    super(`SansIOPolicyRunner(${policyName(policy)})`);
  }

  send(request: PipelineRequest): PipelineResponse {
    requireSyncHook(this.policy.onRequest?.(request), this.policy, "onRequest");

    const result = sendSettled(this.next, request);
    if (!result.ok) {
      requireSyncHook(
        this.policy.onException?.(request, result.error),
        this.policy,
        "onException"
      );
      throw result.error;
    }

    requireSyncHook(
      this.policy.onResponse?.(request, result.response),
      this.policy,
      "onResponse"
    );
    return result.response;
  }
}

export class AsyncSansIOPolicyRunner extends AsyncHttpPolicy {
  constructor(private readonly policy: SansIOPolicy) {
    super(`AsyncSansIOPolicyRunner(${policyName(policy)})`);
  }

  async send(request: PipelineRequest): Promise<PipelineResponse> {
    await this.policy.onRequest?.(request);

    const result = await sendSettledAsync(this.next, request);
    if (!result.ok) {
      await this.policy.onException?.(request, result.error);
      throw result.error;
    }

    await this.policy.onResponse?.(request, result.response);
    return result.response;
  }
}

/**
 * Terminal link: hands the request to the transport and wraps the result
 * Transport errors propagate unwrapped
 */
export class TransportRunner extends HttpPolicy {
  constructor(private readonly transport: HttpTransport) {
    super("TransportRunner");
  }

  send(request: PipelineRequest): PipelineResponse {
    return new PipelineResponse(
      request.httpRequest,
      this.transport.send(request.httpRequest, optionsForTransport(request.context.options)),
      request.context
    );
  }
}

export class AsyncTransportRunner extends AsyncHttpPolicy {
  constructor(private readonly transport: AsyncHttpTransport) {
    super("AsyncTransportRunner");
  }

  async send(request: PipelineRequest): Promise<PipelineResponse> {
    const httpResponse = await this.transport.send(
      request.httpRequest,
      optionsForTransport(request.context.options)
    );
    return new PipelineResponse(request.httpRequest, httpResponse, request.context);
  }
}

// pattern: Imperative Shell
// Pipeline assembly and the single `run` entry point

import { PolicyContractError } from "../utils/errors.js";

import {
  PipelineContext,
  PipelineRequest,
  type CallOptions,
  type PipelineResponse,
} from "./context.js";
import {
  assertConcurrency,
  DEFAULT_MULTIPART_CONCURRENCY,
  prepareMultipartMixedRequest,
  prepareMultipartMixedRequestSync,
} from "./multipart.js";
import {
  AsyncSansIOPolicyRunner,
  AsyncTransportRunner,
  SansIOPolicyRunner,
  TransportRunner,
} from "./runners.js";
import {
  AsyncHttpPolicy,
  HttpPolicy,
  policyName,
  type AsyncHttpTransport,
  type AsyncPolicy,
  type ChainLink,
  type HttpTransport,
  type SyncPolicy,
} from "./types.js";

import type { HttpRequest } from "../http/request.js";

export interface AsyncPipelineOptions {
  /** Upper bound on sub-requests prepared at once for multipart batches */
  multipartConcurrency?: number;
}

/**
 * Link `links[i].next = links[i + 1]`, the last one to `terminal`
 * @returns the head of the chain (`terminal` when there are no links)
 */
function linkChain<T extends ChainLink<T>>(links: readonly T[], terminal: T): T {
  let next = terminal;
  for (let i = links.length - 1; i >= 0; i--) {
    const link = links[i];
    if (link) {
      link.next = next;
      next = link;
    }
  }
  return next;
}

/**
 * Synchronous pipeline
 *
 * Flow of one `run`:
 * 1. Multipart sub-requests get their sub-policy onRequest hooks, then the body is built
 * 2. A fresh context wraps a copy of the call options and the transport
 * 3. Policies run top to bottom on the way down and unwind bottom to top
 * 4. The transport runner at the end performs the send
 *
 * The chain is fixed at construction; a chaining policy instance belongs to
 * exactly one pipeline because linking sets its `next`.
 */
export class Pipeline {
  private readonly head: HttpPolicy;

  constructor(
    private readonly transport: HttpTransport,
    policies: Iterable<SyncPolicy> = []
  ) {
    const links: HttpPolicy[] = [];
    for (const policy of policies) {
      if (policy instanceof HttpPolicy) {
        links.push(policy);
      } else if (policy instanceof AsyncHttpPolicy) {
        throw new PolicyContractError(
          `${policyName(policy)} is an asynchronous chaining policy and cannot join a synchronous pipeline`,
          policyName(policy)
        );
      } else {
        links.push(new SansIOPolicyRunner(policy));
      }
    }
    this.head = linkChain(links, new TransportRunner(transport));
  }

  run(request: HttpRequest, options: CallOptions = {}): PipelineResponse {
    if (request.multipartMixedInfo) {
      prepareMultipartMixedRequestSync(request);
      request.prepareMultipartBody();
    }
    const context = new PipelineContext(this.transport, { ...options });
    return this.head.send(new PipelineRequest(request, context));
  }

  open(): this {
    this.transport.open();
    return this;
  }

  close(): void {
    this.transport.close();
  }

  /**
   * Open the transport, run `fn`, and close the transport on every exit path
   */
  use<T>(fn: (pipeline: this) => T): T {
    this.open();
    try {
      return fn(this);
    } finally {
      this.close();
    }
  }
}

/**
 * Asynchronous pipeline; same flow as Pipeline, with hooks and sends that may suspend
 * Safe to share across concurrent `run` calls
 */
export class AsyncPipeline {
  private readonly head: AsyncHttpPolicy;
  private readonly multipartConcurrency: number;

  constructor(
    private readonly transport: AsyncHttpTransport,
    policies: Iterable<AsyncPolicy> = [],
    options: AsyncPipelineOptions = {}
  ) {
    this.multipartConcurrency =
      options.multipartConcurrency ?? DEFAULT_MULTIPART_CONCURRENCY;
    assertConcurrency(this.multipartConcurrency);

    const links: AsyncHttpPolicy[] = [];
    for (const policy of policies) {
      if (policy instanceof AsyncHttpPolicy) {
        links.push(policy);
      } else if (policy instanceof HttpPolicy) {
        throw new PolicyContractError(
          `${policyName(policy)} is a synchronous chaining policy and cannot join an asynchronous pipeline`,
          policyName(policy)
        );
      } else {
        links.push(new AsyncSansIOPolicyRunner(policy));
      }
    }
    this.head = linkChain(links, new AsyncTransportRunner(transport));
  }

  async run(request: HttpRequest, options: CallOptions = {}): Promise<PipelineResponse> {
    if (request.multipartMixedInfo) {
      await prepareMultipartMixedRequest(request, this.multipartConcurrency);
      request.prepareMultipartBody();
    }
    const context = new PipelineContext(this.transport, { ...options });
    return this.head.send(new PipelineRequest(request, context));
  }

  async open(): Promise<this> {
    await this.transport.open();
    return this;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  async use<T>(fn: (pipeline: this) => Promise<T> | T): Promise<T> {
    await this.open();
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }
}

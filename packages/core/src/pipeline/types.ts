// pattern: Functional Core
// Policy and transport contracts for the request pipeline

import { PolicyContractError } from "../utils/errors.js";

import type { HttpRequest } from "../http/request.js";
import type { HttpResponse } from "../http/response.js";
import type {
  PipelineRequest,
  PipelineResponse,
  TransportOptions,
} from "./context.js";

export type HookResult = void | Promise<void>;

/**
 * Simple policy: observes and mutates the request and response around the
 * downstream send, without controlling whether the send happens
 *
 * Hooks are optional. Synchronous hooks work in both pipelines; hooks that
 * return a promise only work in AsyncPipeline.
 */
export interface SansIOPolicy {
  /** Optional name for debugging and logging */
  readonly name?: string;

  /** Runs before the downstream send; throwing aborts the call */
  onRequest?(request: PipelineRequest): HookResult;

  /** Runs after a successful downstream send */
  onResponse?(request: PipelineRequest, response: PipelineResponse): HookResult;

  /**
   * Runs when the downstream send threw
   * The error keeps propagating after this returns
   */
  onException?(request: PipelineRequest, error: unknown): HookResult;
}

/**
 * A node in the singly linked chain
 * `next` is set once when the pipeline links its policies
 */
export abstract class ChainLink<TLink> {
  readonly name: string;
  private nextLink: TLink | undefined;

  constructor(name?: string) {
    this.name = name ?? this.constructor.name;
  }

  get next(): TLink {
    if (this.nextLink === undefined) {
      throw new PolicyContractError(
        `${this.name} has no next link; it must be linked into a pipeline before sending`,
        this.name
      );
    }
    return this.nextLink;
  }

  set next(link: TLink) {
    this.nextLink = link;
  }
}

/**
 * Chaining policy for the synchronous pipeline
 * Decides whether, when and how often to call `next.send`
 */
export abstract class HttpPolicy extends ChainLink<HttpPolicy> {
  abstract send(request: PipelineRequest): PipelineResponse;
}

/**
 * Chaining policy for the asynchronous pipeline
 */
export abstract class AsyncHttpPolicy extends ChainLink<AsyncHttpPolicy> {
  abstract send(request: PipelineRequest): Promise<PipelineResponse>;
}

/**
 * Performs the network I/O for one request (blocking)
 */
export interface HttpTransport {
  open(): void;
  close(): void;
  send(request: HttpRequest, options: TransportOptions): HttpResponse;
}

/**
 * Performs the network I/O for one request (non-blocking)
 */
export interface AsyncHttpTransport {
  open(): Promise<void>;
  close(): Promise<void>;
  send(request: HttpRequest, options: TransportOptions): Promise<HttpResponse>;
}

export type SyncPolicy = SansIOPolicy | HttpPolicy;
export type AsyncPolicy = SansIOPolicy | AsyncHttpPolicy;

export function policyName(policy: SansIOPolicy | HttpPolicy | AsyncHttpPolicy): string {
  return policy.name ?? policy.constructor.name;
}

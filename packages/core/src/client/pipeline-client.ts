// pattern: Imperative Shell

import { resolvePipelineSettings } from "../config/loader.js";
import { AsyncPipeline } from "../pipeline/pipeline.js";
import { FetchTransport } from "../transports/fetch-transport.js";

import { createPolicies } from "./policies.js";

import type { PipelineSettings } from "../config/types.js";
import type { HttpRequest } from "../http/request.js";
import type { HttpResponse } from "../http/response.js";
import type { CallOptions } from "../pipeline/context.js";
import type { AsyncHttpTransport, AsyncPolicy } from "../pipeline/types.js";
import type { TokenCredential } from "../policies/bearer-token.js";
import type { PipelineTracer } from "../policies/tracing.js";
import type { Logger } from "pino";

export interface PipelineClientOptions {
  /** Base URL that relative request URLs resolve against */
  endpoint: string;
  settings?: PipelineSettings;
  transport?: AsyncHttpTransport;
  credential?: TokenCredential;
  scopes?: string | string[];
  logger?: Logger;
  tracer?: PipelineTracer;
  /** Replaces the standard policy list */
  policies?: AsyncPolicy[];
}

/**
 * Thin client over an AsyncPipeline with the standard policies
 */
export class PipelineClient {
  readonly endpoint: string;
  readonly pipeline: AsyncPipeline;

  constructor(options: PipelineClientOptions) {
    this.endpoint = options.endpoint;
    const settings = options.settings ?? {};
    const resolved = resolvePipelineSettings(settings);

    const transport =
      options.transport ??
      new FetchTransport({ timeoutMs: resolved.transport.timeoutMs, logger: options.logger });
    const policies =
      options.policies ??
      createPolicies(settings, {
        credential: options.credential,
        scopes: options.scopes,
        logger: options.logger,
        tracer: options.tracer,
      });

    this.pipeline = new AsyncPipeline(transport, policies, {
      multipartConcurrency: resolved.multipart.concurrency,
    });
  }

  /**
   * Run `request` through the pipeline
   * A relative URL is resolved against the endpoint first
   */
  async sendRequest(request: HttpRequest, options: CallOptions = {}): Promise<HttpResponse> {
    request.url = new URL(request.url, this.endpoint).toString();
    const response = await this.pipeline.run(request, options);
    return response.httpResponse;
  }

  async close(): Promise<void> {
    await this.pipeline.close();
  }
}

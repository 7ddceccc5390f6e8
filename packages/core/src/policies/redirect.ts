// pattern: Mixed (unavoidable)

import { componentLogger } from "../logger/instance.js";
import {
  takeOption,
  type PipelineContext,
  type PipelineRequest,
  type PipelineResponse,
} from "../pipeline/context.js";
import { AsyncHttpPolicy, HttpPolicy } from "../pipeline/types.js";

import type { HttpResponse } from "../http/response.js";
import type { Logger } from "pino";

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([300, 301, 302, 303, 307, 308]);
export const DEFAULT_MAX_REDIRECTS = 30;

export interface RedirectPolicyOptions {
  enabled?: boolean;
  maxRedirects?: number;
  logger?: Logger;
}

/**
 * Where to go next and how the request changes on the way
 */
export class RedirectStrategy {
  readonly enabled: boolean;
  readonly maxRedirects: number;
  private readonly originHosts = new WeakMap<PipelineContext, string>();

  constructor(options: RedirectPolicyOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  }

  /** Per-call `permitRedirects` switch, held for every attempt of the call */
  permits(context: PipelineContext): boolean {
    return takeOption(context, "permitRedirects") ?? this.enabled;
  }

  /**
   * Flag a send whose host differs from the host of the call's first send
   * Runs before every send, so a retry of a redirected request is flagged too
   */
  markDomainChange(request: PipelineRequest): void {
    const context = request.context;
    const host = new URL(request.httpRequest.url).host;
    const origin = this.originHosts.get(context) ?? host;
    this.originHosts.set(context, origin);

    if (host === origin) {
      Reflect.deleteProperty(context.options, "insecureDomainChange");
    } else {
      context.options.insecureDomainChange = true;
    }
  }

  location(response: HttpResponse): string | undefined {
    if (!REDIRECT_STATUSES.has(response.status)) {
      return undefined;
    }
    return response.headers.get("location") ?? undefined;
  }

  /**
   * Point the request at `location`
   * @returns the absolute target URL
   */
  follow(request: PipelineRequest, response: HttpResponse, location: string): string {
    const http = request.httpRequest;
    const current = new URL(http.url);
    const target = new URL(location, current);

    const rewritesToGet =
      response.status === 303 ||
      ((response.status === 301 || response.status === 302) &&
        http.method !== "GET" &&
        http.method !== "HEAD");
    if (rewritesToGet) {
      http.method = "GET";
      http.body = undefined;
      http.headers.delete("content-length");
      http.headers.delete("content-type");
    }

    http.url = target.toString();
    return http.url;
  }
}

/**
 * Follows 3xx responses that carry a Location header
 * Past `maxRedirects` the last redirect response is returned as is
 */
export class RedirectPolicy extends HttpPolicy {
  readonly strategy: RedirectStrategy;
  private readonly logger: Logger;

  constructor(options: RedirectPolicyOptions = {}) {
    super("RedirectPolicy");
    this.strategy = new RedirectStrategy(options);
    this.logger = componentLogger("redirect", options.logger);
  }

  send(request: PipelineRequest): PipelineResponse {
    const permitted = this.strategy.permits(request.context);

    for (let redirects = 0; ; redirects++) {
      this.strategy.markDomainChange(request);
      const response = this.next.send(request);
      const location = permitted ? this.strategy.location(response.httpResponse) : undefined;
      if (location === undefined || redirects >= this.strategy.maxRedirects) {
        return response;
      }
      const url = this.strategy.follow(request, response.httpResponse, location);
      this.logger.debug({ status: response.httpResponse.status, url }, "Following redirect");
    }
  }
}

export class AsyncRedirectPolicy extends AsyncHttpPolicy {
  readonly strategy: RedirectStrategy;
  private readonly logger: Logger;

  constructor(options: RedirectPolicyOptions = {}) {
    super("AsyncRedirectPolicy");
    this.strategy = new RedirectStrategy(options);
    this.logger = componentLogger("redirect", options.logger);
  }

  async send(request: PipelineRequest): Promise<PipelineResponse> {
    const permitted = this.strategy.permits(request.context);

    for (let redirects = 0; ; redirects++) {
      this.strategy.markDomainChange(request);
      const response = await this.next.send(request);
      const location = permitted ? this.strategy.location(response.httpResponse) : undefined;
      if (location === undefined || redirects >= this.strategy.maxRedirects) {
        return response;
      }
      const url = this.strategy.follow(request, response.httpResponse, location);
      this.logger.debug({ status: response.httpResponse.status, url }, "Following redirect");
    }
  }
}

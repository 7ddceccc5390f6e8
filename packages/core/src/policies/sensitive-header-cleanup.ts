// pattern: Functional Core

import type { PipelineRequest } from "../pipeline/context.js";
import type { SansIOPolicy } from "../pipeline/types.js";

export const DEFAULT_BLOCKED_HEADERS: readonly string[] = [
  "Authorization",
  "Proxy-Authorization",
  "Cookie",
];

export interface SensitiveHeaderCleanupPolicyOptions {
  blockedHeaders?: readonly string[];
  /** When true, credentials follow redirects to other hosts */
  disabled?: boolean;
}

/**
 * Strips credential headers from sends that go to a host other than the call's original one
 * Reacts to the `insecureDomainChange` option, which redirect handling sets before every send;
 * belongs nearest the transport
 */
export class SensitiveHeaderCleanupPolicy implements SansIOPolicy {
  readonly name = "SensitiveHeaderCleanupPolicy";
  private readonly blockedHeaders: readonly string[];
  private readonly disabled: boolean;

  constructor(options: SensitiveHeaderCleanupPolicyOptions = {}) {
    this.blockedHeaders = options.blockedHeaders ?? DEFAULT_BLOCKED_HEADERS;
    this.disabled = options.disabled ?? false;
  }

  onRequest(request: PipelineRequest): void {
    if (!request.context.options.insecureDomainChange || this.disabled) {
      return;
    }
    for (const header of this.blockedHeaders) {
      request.httpRequest.headers.delete(header);
    }
  }
}

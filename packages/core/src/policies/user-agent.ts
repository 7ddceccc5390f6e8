// pattern: Functional Core

import { platform } from "node:os";

import { takeOption, type PipelineRequest } from "../pipeline/context.js";
import { VERSION } from "../version.js";

import type { SansIOPolicy } from "../pipeline/types.js";

export interface UserAgentPolicyOptions {
  /** Prefix identifying the calling application */
  applicationId?: string;
  /** Replace the whole header instead of composing one */
  overwrite?: boolean;
  baseUserAgent?: string;
}

export function defaultUserAgent(): string {
  return `pipewright/${VERSION} Node/${process.version} (${platform()})`;
}

/**
 * Sets User-Agent to `[per-call userAgent ][applicationId ]<base>`
 */
export class UserAgentPolicy implements SansIOPolicy {
  readonly name = "UserAgentPolicy";
  readonly userAgent: string;
  private readonly overwrite: boolean;

  constructor(options: UserAgentPolicyOptions = {}) {
    const base = options.baseUserAgent ?? defaultUserAgent();
    this.userAgent = options.applicationId ? `${options.applicationId} ${base}` : base;
    this.overwrite = options.overwrite ?? false;
  }

  onRequest(request: PipelineRequest): void {
    const { headers } = request.httpRequest;
    const perCall = takeOption(request.context, "userAgent");

    if (this.overwrite || !headers.has("user-agent")) {
      headers.set("user-agent", this.userAgent);
    }
    if (perCall) {
      headers.set("user-agent", `${perCall} ${headers.get("user-agent") ?? ""}`.trim());
    }
  }
}

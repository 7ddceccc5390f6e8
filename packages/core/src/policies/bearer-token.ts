// pattern: Imperative Shell

import { componentLogger } from "../logger/instance.js";
import { takeOption, type PipelineRequest, type PipelineResponse } from "../pipeline/context.js";
import { AsyncHttpPolicy } from "../pipeline/types.js";
import { ClientAuthenticationError } from "../utils/errors.js";

import type { HttpResponse } from "../http/response.js";
import type { Logger } from "pino";

export interface AccessToken {
  token: string;
  /** Expiry as a Unix timestamp in milliseconds */
  expiresOnTimestamp: number;
}

export interface GetTokenOptions {
  claims?: string;
  enableCae?: boolean;
  abortSignal?: AbortSignal;
}

export interface TokenCredential {
  getToken(scopes: string | string[], options?: GetTokenOptions): Promise<AccessToken | null>;
}

export interface BearerTokenCredentialPolicyOptions {
  enableCae?: boolean;
  /** Refresh this long before expiry; defaults to five minutes */
  refreshWindowMs?: number;
  logger?: Logger;
  now?: () => number;
}

export const DEFAULT_REFRESH_WINDOW_MS = 5 * 60 * 1000;

/**
 * Claims from a `WWW-Authenticate` Bearer challenge, base64-decoded
 * Undefined when the challenge has no claims parameter
 */
export function getChallengeClaims(header: string | null): string | undefined {
  if (header === null) {
    return undefined;
  }
  const params = new Map<string, string>();
  for (const match of header.matchAll(/([\w-]+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      params.set(key.toLowerCase(), value);
    }
  }
  const encoded = params.get("claims");
  if (!encoded) {
    return undefined;
  }
  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  return decoded === "" ? undefined : decoded;
}

/**
 * Authorizes requests with a bearer token from a TokenCredential
 *
 * The token cache is shared by every call through this policy. Concurrent
 * calls that find it stale wait on a single refresh.
 */
export class BearerTokenCredentialPolicy extends AsyncHttpPolicy {
  private readonly scopes: string[];
  private readonly enableCae: boolean;
  private readonly refreshWindowMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private token: AccessToken | undefined;
  private pendingRefresh: Promise<AccessToken> | undefined;

  constructor(
    private readonly credential: TokenCredential,
    scopes: string | string[],
    options: BearerTokenCredentialPolicyOptions = {}
  ) {
    super("BearerTokenCredentialPolicy");
    this.scopes = typeof scopes === "string" ? [scopes] : [...scopes];
    this.enableCae = options.enableCae ?? false;
    this.refreshWindowMs = options.refreshWindowMs ?? DEFAULT_REFRESH_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.logger = componentLogger("bearer-token", options.logger);
  }

  async send(request: PipelineRequest): Promise<PipelineResponse> {
    await this.authorizeRequest(request);
    const response = await this.next.send(request);

    const claims = this.challengeClaims(response.httpResponse);
    if (claims === undefined) {
      return response;
    }

    this.logger.debug({ url: request.httpRequest.url }, "Answering claims challenge");
    const token = await this.fetchToken({
      claims,
      enableCae: true,
      abortSignal: request.context.options.abortSignal,
    });
    request.httpRequest.headers.set("authorization", `Bearer ${token.token}`);
    return this.next.send(request);
  }

  private async authorizeRequest(request: PipelineRequest): Promise<void> {
    const enforceHttps = takeOption(request.context, "enforceHttps") ?? true;
    if (enforceHttps && new URL(request.httpRequest.url).protocol !== "https:") {
      throw new ClientAuthenticationError(
        "Bearer token authentication is not permitted for non-TLS protected (non-https) URLs."
      );
    }

    const cached = this.token;
    const token =
      cached !== undefined && !this.isStale(cached)
        ? cached
        : await this.refresh({
            enableCae: request.context.options.enableCae ?? this.enableCae,
            abortSignal: request.context.options.abortSignal,
          });
    request.httpRequest.headers.set("authorization", `Bearer ${token.token}`);
  }

  private isStale(token: AccessToken): boolean {
    return token.expiresOnTimestamp - this.now() <= this.refreshWindowMs;
  }

  private refresh(options: GetTokenOptions): Promise<AccessToken> {
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.fetchToken(options).finally(() => {
        this.pendingRefresh = undefined;
      });
    }
    return this.pendingRefresh;
  }

  private async fetchToken(options: GetTokenOptions): Promise<AccessToken> {
    let token: AccessToken | null;
    try {
      token = await this.credential.getToken(this.scopes, options);
    } catch (error) {
      throw new ClientAuthenticationError(
        `Failed to acquire a token for scopes ${this.scopes.join(", ")}`,
        error
      );
    }
    if (!token) {
      throw new ClientAuthenticationError(
        `Credential returned no token for scopes ${this.scopes.join(", ")}`
      );
    }
    this.token = token;
    return token;
  }

  private challengeClaims(response: HttpResponse): string | undefined {
    if (response.status !== 401) {
      return undefined;
    }
    return getChallengeClaims(response.headers.get("www-authenticate"));
  }
}

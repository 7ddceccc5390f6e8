export {
  BearerTokenCredentialPolicy,
  DEFAULT_REFRESH_WINDOW_MS,
  getChallengeClaims,
} from "./bearer-token.js";
export type {
  AccessToken,
  BearerTokenCredentialPolicyOptions,
  GetTokenOptions,
  TokenCredential,
} from "./bearer-token.js";
export { CustomHookPolicy } from "./custom-hook.js";
export type { CustomHookPolicyOptions } from "./custom-hook.js";
export { HeadersPolicy } from "./headers.js";
export {
  DEFAULT_ALLOWED_HEADER_NAMES,
  DEFAULT_ALLOWED_QUERY_PARAMS,
  NetworkLoggingPolicy,
  REDACTED,
} from "./logging.js";
export type { NetworkLoggingPolicyOptions } from "./logging.js";
export {
  AsyncRedirectPolicy,
  DEFAULT_MAX_REDIRECTS,
  REDIRECT_STATUSES,
  RedirectPolicy,
  RedirectStrategy,
} from "./redirect.js";
export type { RedirectPolicyOptions } from "./redirect.js";
export { REQUEST_ID_HEADER, RequestIdPolicy } from "./request-id.js";
export {
  AsyncRetryPolicy,
  DEFAULT_BACKOFF_FACTOR_MS,
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_STATUS_CODES,
  parseRetryAfterMs,
  RETRY_COUNT_KEY,
  RetryPolicy,
  RetryStrategy,
  sleepSync,
} from "./retry.js";
export type {
  AsyncRetryPolicyOptions,
  RetryDecision,
  RetryMode,
  RetryPolicyOptions,
  SyncRetryPolicyOptions,
} from "./retry.js";
export {
  DEFAULT_BLOCKED_HEADERS,
  SensitiveHeaderCleanupPolicy,
} from "./sensitive-header-cleanup.js";
export type { SensitiveHeaderCleanupPolicyOptions } from "./sensitive-header-cleanup.js";
export { DEFAULT_TRACER_NAME, DistributedTracingPolicy } from "./tracing.js";
export type {
  DistributedTracingPolicyOptions,
  PipelineSpan,
  PipelineTracer,
} from "./tracing.js";
export { TrafficRecorderPolicy } from "./traffic-recorder.js";
export type { TrafficRecorderPolicyOptions } from "./traffic-recorder.js";
export { defaultUserAgent, UserAgentPolicy } from "./user-agent.js";
export type { UserAgentPolicyOptions } from "./user-agent.js";

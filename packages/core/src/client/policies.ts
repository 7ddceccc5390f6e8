// pattern: Functional Core
// Standard policy order; each policy sees the request after the ones above it

import { resolvePipelineSettings } from "../config/loader.js";
import { getPipelineLogger } from "../logger/instance.js";
import { BearerTokenCredentialPolicy, type TokenCredential } from "../policies/bearer-token.js";
import { CustomHookPolicy } from "../policies/custom-hook.js";
import { HeadersPolicy } from "../policies/headers.js";
import { NetworkLoggingPolicy } from "../policies/logging.js";
import { AsyncRedirectPolicy, RedirectPolicy } from "../policies/redirect.js";
import { RequestIdPolicy } from "../policies/request-id.js";
import { AsyncRetryPolicy, RetryPolicy } from "../policies/retry.js";
import { SensitiveHeaderCleanupPolicy } from "../policies/sensitive-header-cleanup.js";
import { DistributedTracingPolicy, type PipelineTracer } from "../policies/tracing.js";
import { TrafficRecorderPolicy } from "../policies/traffic-recorder.js";
import { UserAgentPolicy } from "../policies/user-agent.js";

import type { PipelineSettings, ResolvedPipelineSettings } from "../config/types.js";
import type { AsyncPolicy, SansIOPolicy, SyncPolicy } from "../pipeline/types.js";
import type { Logger } from "pino";

export interface PolicyFactoryOptions {
  logger?: Logger;
  tracer?: PipelineTracer;
}

export interface AsyncPolicyFactoryOptions extends PolicyFactoryOptions {
  credential?: TokenCredential;
  scopes?: string | string[];
}

// An explicit logging level applies to every policy of the pipeline
function pipelineLogger(settings: PipelineSettings, logger: Logger | undefined): Logger {
  const base = logger ?? getPipelineLogger();
  const level = settings.logging?.level;
  return level === undefined ? base : base.child({}, { level });
}

function headPolicies(
  resolved: ResolvedPipelineSettings,
  options: PolicyFactoryOptions
): SansIOPolicy[] {
  return [
    new HeadersPolicy(resolved.headers),
    new UserAgentPolicy({ applicationId: resolved.userAgent.applicationId }),
    new RequestIdPolicy(),
    new DistributedTracingPolicy({
      tracer: options.tracer,
      tracerName: resolved.tracing.tracerName,
      enabled: resolved.tracing.enabled,
    }),
  ];
}

function networkLogging(resolved: ResolvedPipelineSettings, logger: Logger): NetworkLoggingPolicy {
  return new NetworkLoggingPolicy({
    enabled: resolved.logging.enabled,
    allowedHeaderNames: resolved.logging.allowedHeaderNames,
    allowedQueryParams: resolved.logging.allowedQueryParams,
    logger,
  });
}

/**
 * Policies for an AsyncPipeline:
 * headers, user agent, request id, tracing, retry, bearer token, redirect,
 * custom hook, logging, traffic recorder, sensitive header cleanup
 */
export function createPolicies(
  settings: PipelineSettings = {},
  options: AsyncPolicyFactoryOptions = {}
): AsyncPolicy[] {
  const resolved = resolvePipelineSettings(settings);
  const logger = pipelineLogger(settings, options.logger);

  const policies: AsyncPolicy[] = [
    ...headPolicies(resolved, options),
    new AsyncRetryPolicy({ ...resolved.retry, logger }),
  ];
  if (options.credential) {
    policies.push(
      new BearerTokenCredentialPolicy(options.credential, options.scopes ?? [], { logger })
    );
  }
  policies.push(
    new AsyncRedirectPolicy({ ...resolved.redirect, logger }),
    new CustomHookPolicy(),
    networkLogging(resolved, logger)
  );
  if (resolved.recording) {
    policies.push(new TrafficRecorderPolicy(resolved.recording.path, { logger }));
  }
  policies.push(
    new SensitiveHeaderCleanupPolicy({
      blockedHeaders: resolved.sensitiveHeaders.blockedHeaders,
      disabled: !resolved.sensitiveHeaders.enabled,
    })
  );
  return policies;
}

/**
 * Policies for a synchronous Pipeline; same order without bearer token and recorder
 */
export function createSyncPolicies(
  settings: PipelineSettings = {},
  options: PolicyFactoryOptions = {}
): SyncPolicy[] {
  const resolved = resolvePipelineSettings(settings);
  const logger = pipelineLogger(settings, options.logger);

  return [
    ...headPolicies(resolved, options),
    new RetryPolicy({ ...resolved.retry, logger }),
    new RedirectPolicy({ ...resolved.redirect, logger }),
    new CustomHookPolicy(),
    networkLogging(resolved, logger),
    new SensitiveHeaderCleanupPolicy({
      blockedHeaders: resolved.sensitiveHeaders.blockedHeaders,
      disabled: !resolved.sensitiveHeaders.enabled,
    }),
  ];
}

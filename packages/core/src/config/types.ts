import { type Static, Type } from "@sinclair/typebox";

import { LOG_LEVELS } from "../logger/config.js";

export const RetrySettings = Type.Object({
  maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
  backoffFactorMs: Type.Optional(Type.Number({ minimum: 0 })),
  backoffMaxMs: Type.Optional(Type.Number({ minimum: 0 })),
  mode: Type.Optional(Type.Union([Type.Literal("exponential"), Type.Literal("fixed")])),
  statusCodes: Type.Optional(Type.Array(Type.Integer({ minimum: 100, maximum: 599 }))),
});
export type RetrySettings = Static<typeof RetrySettings>;

export const RedirectSettings = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  maxRedirects: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type RedirectSettings = Static<typeof RedirectSettings>;

export const LoggingSettings = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  level: Type.Optional(Type.Union(LOG_LEVELS.map(level => Type.Literal(level)))),
  allowedHeaderNames: Type.Optional(Type.Array(Type.String())),
  allowedQueryParams: Type.Optional(Type.Array(Type.String())),
});
export type LoggingSettings = Static<typeof LoggingSettings>;

export const UserAgentSettings = Type.Object({
  applicationId: Type.Optional(Type.String({ maxLength: 24 })),
});

export const MultipartSettings = Type.Object({
  concurrency: Type.Optional(Type.Integer({ minimum: 1 })),
});

export const TransportSettings = Type.Object({
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
});

export const SensitiveHeaderSettings = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  blockedHeaders: Type.Optional(Type.Array(Type.String())),
});

export const TracingSettings = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  tracerName: Type.Optional(Type.String({ minLength: 1 })),
});

export const RecordingSettings = Type.Object({
  path: Type.String({ minLength: 1 }),
});

/**
 * Pipeline settings file; every section is optional
 */
export const PipelineSettings = Type.Object(
  {
    retry: Type.Optional(RetrySettings),
    redirect: Type.Optional(RedirectSettings),
    logging: Type.Optional(LoggingSettings),
    headers: Type.Optional(Type.Record(Type.String(), Type.String())),
    userAgent: Type.Optional(UserAgentSettings),
    multipart: Type.Optional(MultipartSettings),
    transport: Type.Optional(TransportSettings),
    sensitiveHeaders: Type.Optional(SensitiveHeaderSettings),
    tracing: Type.Optional(TracingSettings),
    recording: Type.Optional(RecordingSettings),
  },
  { additionalProperties: false }
);
export type PipelineSettings = Static<typeof PipelineSettings>;

/**
 * Settings with every default filled in
 */
export interface ResolvedPipelineSettings {
  retry: Required<RetrySettings>;
  redirect: Required<RedirectSettings>;
  logging: Required<LoggingSettings>;
  headers: Record<string, string>;
  userAgent: { applicationId: string | undefined };
  multipart: { concurrency: number };
  transport: { timeoutMs: number };
  sensitiveHeaders: { enabled: boolean; blockedHeaders: string[] };
  tracing: { enabled: boolean; tracerName: string };
  recording: { path: string } | undefined;
}

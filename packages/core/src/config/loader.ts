// pattern: Functional Core

import { parse as parseToml } from "@iarna/toml";
import { readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";

import { DEFAULT_MULTIPART_CONCURRENCY } from "../pipeline/multipart.js";
import { DEFAULT_ALLOWED_HEADER_NAMES, DEFAULT_ALLOWED_QUERY_PARAMS } from "../policies/logging.js";
import { DEFAULT_MAX_REDIRECTS } from "../policies/redirect.js";
import {
  DEFAULT_BACKOFF_FACTOR_MS,
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_STATUS_CODES,
} from "../policies/retry.js";
import { DEFAULT_BLOCKED_HEADERS } from "../policies/sensitive-header-cleanup.js";
import { DEFAULT_TRACER_NAME } from "../policies/tracing.js";
import { DEFAULT_TIMEOUT_MS } from "../transports/fetch-transport.js";
import { ajv, formatValidationErrors } from "../utils/ajv.js";
import { ValidationError } from "../utils/errors.js";

import { PipelineSettings, type ResolvedPipelineSettings } from "./types.js";

// Compile schema once for reuse
const validatePipelineSettings = ajv.compile<PipelineSettings>(PipelineSettings);

/**
 * Loads and parses settings from a file path, automatically detecting format
 * by file extension (.json, .yaml/.yml, .toml)
 */
export async function loadPipelineSettingsFromFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf8");
  const ext = extname(filePath).toLowerCase();

  switch (ext) {
    case ".json":
      return JSON.parse(content);
    case ".yaml":
    case ".yml":
      return parseYaml(content);
    case ".toml":
      return parseToml(content);
    default:
      throw new ValidationError(
        `Unsupported file format: ${ext}. Supported formats: .json, .yaml, .yml, .toml`
      );
  }
}

/**
 * Validates a JavaScript object against the PipelineSettings schema
 */
export function validatePipelineSettingsObject(data: unknown): data is PipelineSettings {
  if (!validatePipelineSettings(data)) {
    const messages = formatValidationErrors(validatePipelineSettings.errors);
    throw new ValidationError(`Pipeline settings validation failed: ${messages.join(", ")}`, messages);
  }
  return true;
}

/**
 * Loads and validates pipeline settings from file
 */
export async function loadAndValidatePipelineSettings(filePath: string): Promise<PipelineSettings> {
  const data = await loadPipelineSettingsFromFile(filePath);
  if (validatePipelineSettingsObject(data)) {
    return data;
  }
  // validatePipelineSettingsObject throws instead of returning false
  throw new ValidationError("Unexpected validation state");
}

export function resolvePipelineSettings(settings: PipelineSettings = {}): ResolvedPipelineSettings {
  return {
    retry: {
      maxAttempts: settings.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      backoffFactorMs: settings.retry?.backoffFactorMs ?? DEFAULT_BACKOFF_FACTOR_MS,
      backoffMaxMs: settings.retry?.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS,
      mode: settings.retry?.mode ?? "exponential",
      statusCodes: settings.retry?.statusCodes ?? [...DEFAULT_RETRY_STATUS_CODES],
    },
    redirect: {
      enabled: settings.redirect?.enabled ?? true,
      maxRedirects: settings.redirect?.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
    },
    logging: {
      enabled: settings.logging?.enabled ?? true,
      level: settings.logging?.level ?? "warn",
      allowedHeaderNames: settings.logging?.allowedHeaderNames ?? [...DEFAULT_ALLOWED_HEADER_NAMES],
      allowedQueryParams: settings.logging?.allowedQueryParams ?? [...DEFAULT_ALLOWED_QUERY_PARAMS],
    },
    headers: { ...settings.headers },
    userAgent: { applicationId: settings.userAgent?.applicationId },
    multipart: {
      concurrency: settings.multipart?.concurrency ?? DEFAULT_MULTIPART_CONCURRENCY,
    },
    transport: { timeoutMs: settings.transport?.timeoutMs ?? DEFAULT_TIMEOUT_MS },
    sensitiveHeaders: {
      enabled: settings.sensitiveHeaders?.enabled ?? true,
      blockedHeaders: settings.sensitiveHeaders?.blockedHeaders ?? [...DEFAULT_BLOCKED_HEADERS],
    },
    tracing: {
      enabled: settings.tracing?.enabled ?? true,
      tracerName: settings.tracing?.tracerName ?? DEFAULT_TRACER_NAME,
    },
    recording: settings.recording ? { path: settings.recording.path } : undefined,
  };
}

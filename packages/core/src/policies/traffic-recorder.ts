// pattern: Mixed (unavoidable)
// Recording requires file I/O integrated with request/response processing

import { appendFile } from "fs/promises";

import { componentLogger } from "../logger/instance.js";
import { encodeBody, recordHeaders, type RecordedExchange } from "../transports/recording.js";

import type { PipelineRequest, PipelineResponse } from "../pipeline/context.js";
import type { SansIOPolicy } from "../pipeline/types.js";
import type { Logger } from "pino";

export interface TrafficRecorderPolicyOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Appends every exchange to a JSONL file that ReplayTransport can serve later
 *
 * Recording format: one JSON object per line
 * - Answered: { "timestamp": "...", "request": {...}, "response": {...} }
 * - Failed:   { "timestamp": "...", "request": {...}, "error": "..." }
 *
 * Place it below retry and redirect to record every attempt and hop.
 */
export class TrafficRecorderPolicy implements SansIOPolicy {
  readonly name = "TrafficRecorderPolicy";
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly recordingFilePath: string,
    options: TrafficRecorderPolicyOptions = {}
  ) {
    this.logger = componentLogger("recorder", options.logger);
    this.now = options.now ?? (() => new Date());
  }

  async onResponse(request: PipelineRequest, response: PipelineResponse): Promise<void> {
    const http = response.httpResponse;
    await this.append({
      timestamp: this.now().toISOString(),
      request: this.recordRequest(request),
      response: {
        status: http.status,
        statusText: http.statusText,
        headers: recordHeaders(http.headers),
        body: encodeBody(http.body),
      },
    });
  }

  async onException(request: PipelineRequest, error: unknown): Promise<void> {
    await this.append({
      timestamp: this.now().toISOString(),
      request: this.recordRequest(request),
      error: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
    });
  }

  private recordRequest(request: PipelineRequest): RecordedExchange["request"] {
    const http = request.httpRequest;
    const recorded: RecordedExchange["request"] = {
      method: http.method,
      url: http.url,
      headers: recordHeaders(http.headers),
    };
    if (http.body !== undefined) {
      recorded.body = encodeBody(http.bodyBytes());
    }
    return recorded;
  }

  // A failed write must not fail the call it records
  private async append(entry: RecordedExchange): Promise<void> {
    try {
      await appendFile(this.recordingFilePath, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (error) {
      this.logger.warn(
        { err: error, path: this.recordingFilePath },
        "Failed to write traffic recording entry"
      );
    }
  }
}

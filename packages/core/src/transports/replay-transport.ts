// pattern: Imperative Shell

import { readFileSync } from "fs";
import { readFile } from "fs/promises";

import { componentLogger } from "../logger/instance.js";
import { RecordingError } from "../utils/errors.js";

import { parseRecording, RecordingReplayer } from "./recording.js";

import type { HttpRequest } from "../http/request.js";
import type { HttpResponse } from "../http/response.js";
import type { TransportOptions } from "../pipeline/context.js";
import type { AsyncHttpTransport, HttpTransport } from "../pipeline/types.js";
import type { Logger } from "pino";

export interface ReplayTransportOptions {
  logger?: Logger;
}

function loadError(filePath: string, error: unknown): RecordingError {
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return new RecordingError(`Recording file not found: ${filePath}`, filePath, error);
  }
  return new RecordingError(`Failed to read recording: ${filePath}`, filePath, error);
}

/**
 * Serves responses from a recording instead of the network (blocking)
 * `open` loads the file; `send` opens on first use
 */
export class ReplayTransport implements HttpTransport {
  private replayer: RecordingReplayer | undefined;
  private readonly logger: Logger;

  constructor(
    readonly recordingFilePath: string,
    options: ReplayTransportOptions = {}
  ) {
    this.logger = componentLogger("replay", options.logger);
  }

  get isOpen(): boolean {
    return this.replayer !== undefined;
  }

  open(): void {
    if (this.replayer) {
      return;
    }
    let content: string;
    try {
      content = readFileSync(this.recordingFilePath, "utf8");
    } catch (error) {
      throw loadError(this.recordingFilePath, error);
    }
    this.replayer = new RecordingReplayer(
      parseRecording(content, this.recordingFilePath),
      this.recordingFilePath
    );
    this.logger.debug(
      { path: this.recordingFilePath, responses: this.replayer.remaining },
      "Loaded recording"
    );
  }

  close(): void {
    this.replayer = undefined;
  }

  send(request: HttpRequest, _options: TransportOptions): HttpResponse {
    if (!this.replayer) {
      this.open();
    }
    return this.currentReplayer().take(request);
  }

  private currentReplayer(): RecordingReplayer {
    if (!this.replayer) {
      throw new RecordingError("Replay transport is not open", this.recordingFilePath);
    }
    return this.replayer;
  }
}

/**
 * Non-blocking counterpart of ReplayTransport
 */
export class AsyncReplayTransport implements AsyncHttpTransport {
  private replayer: RecordingReplayer | undefined;
  private loading: Promise<RecordingReplayer> | undefined;
  private readonly logger: Logger;

  constructor(
    readonly recordingFilePath: string,
    options: ReplayTransportOptions = {}
  ) {
    this.logger = componentLogger("replay", options.logger);
  }

  get isOpen(): boolean {
    return this.replayer !== undefined;
  }

  async open(): Promise<void> {
    await this.load();
  }

  async close(): Promise<void> {
    this.loading = undefined;
    this.replayer = undefined;
  }

  async send(request: HttpRequest, _options: TransportOptions): Promise<HttpResponse> {
    const replayer = await this.load();
    return replayer.take(request);
  }

  /** Concurrent callers share one read of the recording */
  private load(): Promise<RecordingReplayer> {
    if (this.replayer) {
      return Promise.resolve(this.replayer);
    }
    this.loading ??= this.readRecording().then(
      replayer => {
        this.replayer = replayer;
        return replayer;
      },
      (error: unknown) => {
        this.loading = undefined;
        throw error;
      }
    );
    return this.loading;
  }

  private async readRecording(): Promise<RecordingReplayer> {
    let content: string;
    try {
      content = await readFile(this.recordingFilePath, "utf8");
    } catch (error) {
      throw loadError(this.recordingFilePath, error);
    }
    const replayer = new RecordingReplayer(
      parseRecording(content, this.recordingFilePath),
      this.recordingFilePath
    );
    this.logger.debug(
      { path: this.recordingFilePath, responses: replayer.remaining },
      "Loaded recording"
    );
    return replayer;
  }
}

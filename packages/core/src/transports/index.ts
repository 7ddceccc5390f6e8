export { DEFAULT_TIMEOUT_MS, FetchTransport } from "./fetch-transport.js";
export type { FetchTransportOptions } from "./fetch-transport.js";
export {
  decodeBody,
  encodeBody,
  exchangeKey,
  parseRecording,
  RECORDING_REDACTED_HEADERS,
  recordHeaders,
  RecordedBody,
  RecordedExchange,
  RecordedRequest,
  RecordedResponse,
  RecordingReplayer,
} from "./recording.js";
export { AsyncReplayTransport, ReplayTransport } from "./replay-transport.js";
export type { ReplayTransportOptions } from "./replay-transport.js";

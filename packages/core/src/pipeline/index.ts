export {
  PipelineContext,
  PipelineRequest,
  PipelineResponse,
  popOption,
  takeOption,
} from "./context.js";
export type {
  CallOptions,
  RawRequestHook,
  RawResponseHook,
  TracingAttributeValue,
  TracingOptions,
  TransportOptions,
} from "./context.js";
export {
  DEFAULT_MULTIPART_CONCURRENCY,
  prepareMultipartMixedRequest,
  prepareMultipartMixedRequestSync,
} from "./multipart.js";
export { AsyncPipeline, Pipeline } from "./pipeline.js";
export type { AsyncPipelineOptions } from "./pipeline.js";
export { sendSettled, sendSettledAsync } from "./result.js";
export type { SendResult } from "./result.js";
export {
  AsyncSansIOPolicyRunner,
  AsyncTransportRunner,
  optionsForTransport,
  SansIOPolicyRunner,
  TRANSPORT_INCOMPATIBLE_OPTIONS,
  TransportRunner,
} from "./runners.js";
export { AsyncHttpPolicy, ChainLink, HttpPolicy, policyName } from "./types.js";
export type {
  AsyncHttpTransport,
  AsyncPolicy,
  HookResult,
  HttpTransport,
  SansIOPolicy,
  SyncPolicy,
} from "./types.js";

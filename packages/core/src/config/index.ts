export {
  loadAndValidatePipelineSettings,
  loadPipelineSettingsFromFile,
  resolvePipelineSettings,
  validatePipelineSettingsObject,
} from "./loader.js";
export {
  LoggingSettings,
  MultipartSettings,
  PipelineSettings,
  RecordingSettings,
  RedirectSettings,
  RetrySettings,
  SensitiveHeaderSettings,
  TracingSettings,
  TransportSettings,
  UserAgentSettings,
} from "./types.js";
export type { ResolvedPipelineSettings } from "./types.js";

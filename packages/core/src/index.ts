export * from "./client/index.js";
export * from "./config/index.js";
export * from "./http/index.js";
export * from "./logger/index.js";
export * from "./pipeline/index.js";
export * from "./policies/index.js";
export * from "./transports/index.js";
export {
  ClientAuthenticationError,
  isPipewrightError,
  MultipartError,
  PipewrightError,
  PolicyContractError,
  RecordingError,
  ServiceRequestError,
  ServiceRequestTimeoutError,
  ServiceResponseError,
  ValidationError,
} from "./utils/errors.js";
export { VERSION } from "./version.js";

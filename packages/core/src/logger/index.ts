export { createLogger, parseLogLevel } from "./config.js";
export type { LoggerOptions, LogLevel } from "./config.js";
export {
  componentLogger,
  getPipelineLogger,
  setPipelineLogger,
  setPipelineLogLevel,
} from "./instance.js";

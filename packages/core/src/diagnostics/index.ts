export { type EnvSource, envFlag, envPositiveInt, hostEnv, readEnv } from "./env.js";
export {
  createLogger,
  isLogLevel,
  type LogFields,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
  SILENT_LOGGER,
} from "./logger.js";

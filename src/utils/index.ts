export { logDebug, logInfo, logWarn, logError, setLogLevel, getLogLevel, isLogLevel } from "./logger.js";
export type { LogLevel } from "./logger.js";
export { GraphError, FetchError, ConfigurationError, isGraphError } from "./errors.js";

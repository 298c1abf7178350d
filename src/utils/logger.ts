export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_LEVEL: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function resolveLogLevel(): LogLevel {
  const raw = (process.env["ISSUE_GRAPH_LOG_LEVEL"] ?? "").toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LEVEL;
}

let currentLevel = resolveLogLevel();

/**
 * Override the level picked up from ISSUE_GRAPH_LOG_LEVEL (e.g. for --verbose).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

function formatPrefix(level: LogLevel): string {
  const timestamp = new Date().toISOString();
  return `[issue-graph] ${timestamp} ${level.toUpperCase()}`;
}

// Everything goes to stderr: stdout may carry the DOT document.
function emit(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  const prefix = formatPrefix(level);
  const payload = meta && Object.keys(meta).length > 0 ? [meta] : [];
  const handler = level === "warn" ? console.warn : console.error;
  handler(prefix, message, ...payload);
}

export function logDebug(message: string, meta?: Record<string, unknown>): void {
  emit("debug", message, meta);
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  emit("info", message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  emit("warn", message, meta);
}

export function logError(message: string, meta?: Record<string, unknown>): void {
  emit("error", message, meta);
}

// All log output goes to stderr. stdout belongs to the MCP stdio transport.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function emit(level: LogLevel, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;
  console.error(`[${level.toUpperCase()}]`, ...args);
}

export function logDebug(...args: unknown[]): void {
  emit("debug", args);
}

export function logInfo(...args: unknown[]): void {
  emit("info", args);
}

export function logWarn(...args: unknown[]): void {
  emit("warn", args);
}

export function logError(...args: unknown[]): void {
  emit("error", args);
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface LogContext {
  request_id?: string;
  environment_id?: string;
  tenant_id?: string;
  workflow?: string;
}

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: "envplane";
  context?: LogContext;
  data?: Record<string, unknown>;
}

export interface LogOptions {
  context?: LogContext;
  data?: Record<string, unknown>;
}

const CONTEXT_KEYS = ["request_id", "environment_id", "tenant_id", "workflow"] as const;

/** Drops unset keys; answers undefined when nothing is left. */
function compactContext(context: LogContext | undefined): LogContext | undefined {
  if (!context) return undefined;
  const compact: LogContext = {};
  for (const key of CONTEXT_KEYS) {
    const value = context[key];
    if (value) compact[key] = value;
  }
  return Object.keys(compact).length > 0 ? compact : undefined;
}

export function buildLogEntry(level: LogLevel, message: string, options: LogOptions = {}): LogEntry {
  const context = compactContext(options.context);
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    service: "envplane",
    ...(context ? { context } : {}),
    ...(options.data ? { data: options.data } : {})
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Info goes to stdout; warnings and errors to stderr.
function emit(level: LogLevel, message: string, options?: LogOptions): void {
  const stream = level === "info" ? process.stdout : process.stderr;
  stream.write(`${JSON.stringify(buildLogEntry(level, message, options))}\n`);
}

export function logInfo(message: string, options?: LogOptions): void {
  emit("info", message, options);
}

export function logWarn(message: string, options?: LogOptions): void {
  emit("warn", message, options);
}

export function logError(message: string, options?: LogOptions): void {
  emit("error", message, options);
}

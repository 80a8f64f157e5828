import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export interface LogRecord {
  time: Date;
  level: LogLevel;
  name: string;
  message: string;
}

export type LogListener = (record: LogRecord) => void;

export interface Logger {
  debug(message: unknown, ...args: unknown[]): void;
  info(message: unknown, ...args: unknown[]): void;
  warn(message: unknown, ...args: unknown[]): void;
  error(message: unknown, ...args: unknown[]): void;
}

let threshold: LogLevel = "INFO";
let logPath: string | null = null;
const listeners = new Set<LogListener>();

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function configureLogging(options: { level?: LogLevel; logPath?: string | null }): void {
  if (options.level) {
    threshold = options.level;
  }
  if (options.logPath !== undefined) {
    logPath = options.logPath;
    if (logPath) {
      mkdirSync(dirname(logPath), { recursive: true });
    }
  }
}

/** Subscribe to every record that passes the threshold. Returns the unsubscribe function. */
export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function resetLogging(): void {
  threshold = "INFO";
  logPath = null;
  listeners.clear();
}

export function formatRecord(record: LogRecord): string {
  return `${record.time.toISOString()} ${record.level} ${record.name} ${record.message}`;
}

/** One-line `LEVEL: message`, shortened with an ellipsis past `maxLength`. */
export function summarizeRecord(record: Pick<LogRecord, "level" | "message">, maxLength: number): string {
  const text = `${record.level}: ${record.message}`;
  return text.length > maxLength ? `${text.substring(0, maxLength - 3)}...` : text;
}

function render(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function emit(name: string, level: LogLevel, message: unknown, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const record: LogRecord = {
    time: new Date(),
    level,
    name,
    message: [message, ...args].map(render).join(" "),
  };
  const line = formatRecord(record);

  if (level === "ERROR") {
    console.error(line);
  } else if (level === "WARNING") {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (logPath) {
    appendFileSync(logPath, `${line}\n`, "utf-8");
  }

  for (const listener of listeners) {
    listener(record);
  }
}

export function createLogger(name: string): Logger {
  return {
    debug: (message, ...args) => emit(name, "DEBUG", message, args),
    info: (message, ...args) => emit(name, "INFO", message, args),
    warn: (message, ...args) => emit(name, "WARNING", message, args),
    error: (message, ...args) => emit(name, "ERROR", message, args),
  };
}

/**
 * Structured Logger
 * Lightweight wrapper that produces JSON-structured logs for the hosting runner.
 * Every run must be traceable from logs alone; secrets never are.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SECRET_KEY_PATTERN = /key|token|secret|password|webhook|credential/i;

export const REDACTED = "[redacted]";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Replace values under secret-looking keys, recursing into plain objects.
 * Arrays are kept as-is; they only ever carry names, never values.
 */
export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      out[key] = REDACTED;
    } else if (isPlainRecord(value)) {
      out[key] = redact(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

export class Logger {
  private service: string;
  private minLevel: LogLevel;

  constructor(service: string, minLevel?: LogLevel) {
    this.service = service;
    const envLevel = process.env["LOG_LEVEL"];
    this.minLevel = minLevel ?? (isLogLevel(envLevel) ? envLevel : "info");
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(data && { data: redact(data) }),
    };

    const line = JSON.stringify(entry);

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit("error", message, data);
  }

  /** Log a run state change so a run can be replayed from logs */
  transition(runId: string, from: string, to: string, data: Record<string, unknown> = {}): void {
    this.emit("info", `RUN_STATE: ${from} -> ${to}`, {
      ...data,
      runId,
      from,
      to,
    });
  }

  child(subService: string): Logger {
    return new Logger(`${this.service}:${subService}`, this.minLevel);
  }
}

export function createLogger(service: string): Logger {
  return new Logger(service);
}

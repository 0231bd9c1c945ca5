import { now } from "../types/index.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "fatal"];

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

export interface LogEntry {
  traceId?: string;
  timestamp: number;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
}

export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line);
};

export class Logger {
  private _traceId?: string;

  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = "debug",
    private readonly write: LogWriter = stderrWriter,
  ) {}

  setTraceId(traceId: string): void {
    this._traceId = traceId;
  }

  child(component: string): Logger {
    const logger = new Logger(`${this.component}.${component}`, this.minLevel, this.write);
    if (this._traceId) logger.setTraceId(this._traceId);
    return logger;
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: now(),
      level,
      component: this.component,
      message,
    };
    if (this._traceId) {
      entry.traceId = this._traceId;
    }
    if (data !== undefined) {
      entry.data = data;
    }
    // stdout carries plan JSON and summaries; logs stay on stderr
    this.write(JSON.stringify(entry) + "\n");
  }
}

/**
 * Resolve the process-wide default level from SUPERINTENDENT_LOG_LEVEL,
 * falling back to "info" when unset or unrecognised.
 */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.SUPERINTENDENT_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return "info";
}

export class ObservabilityProvider {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = defaultLogLevel(), private readonly write?: LogWriter) {
    this.minLevel = minLevel;
  }

  createLogger(component: string): Logger {
    return new Logger(component, this.minLevel, this.write);
  }
}

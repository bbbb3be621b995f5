export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogPayload = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  environment?: string;
  component?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (!raw) return fallback;
  const value = raw.toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid log level: ${raw}`);
}

export class Logger {
  private readonly level: LogLevel;

  private readonly environment: string;

  private readonly component?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.environment = options.environment ?? process.env.NODE_ENV ?? "development";
    this.component = options.component;
  }

  child(component: string): Logger {
    return new Logger({
      level: this.level,
      environment: this.environment,
      component: this.component ? `${this.component}.${component}` : component,
    });
  }

  debug(message: string, payload?: LogPayload): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: LogPayload): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: LogPayload): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: LogPayload): void {
    this.log("error", message, payload);
  }

  private log(level: LogLevel, message: string, payload?: LogPayload): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) {
      return;
    }

    if (this.environment === "development") {
      const scope = this.component ? ` (${this.component})` : "";
      const meta = payload ? ` ${JSON.stringify(payload, jsonReplacer)}` : "";
      // eslint-disable-next-line no-console
      console.log(`[${level.toUpperCase()}]${scope} ${message}${meta}`);
      return;
    }

    const entry = {
      level,
      message,
      component: this.component,
      timestamp: new Date().toISOString(),
      ...(payload ?? {}),
    };
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(entry, jsonReplacer));
  }
}

// amounts are bigint throughout the ledger
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export const logger = new Logger({ level: parseLogLevel(process.env.LOG_LEVEL) });

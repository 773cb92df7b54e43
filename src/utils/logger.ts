export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  stack?: string;
}

export interface LoggerOptions {
  debug?: boolean;
  /** Messages below this level are dropped (default: info, or debug in debug mode) */
  minLevel?: LogLevel;
  /** Disable ANSI colors (also honoured through NO_COLOR) */
  noColor?: boolean;
}

class Logger {
  private debugMode: boolean;
  private minLevel: LogLevel;
  private noColor: boolean;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? process.env.CORPUSLINT_DEBUG === "true";
    this.minLevel = options.minLevel ?? (this.debugMode ? "debug" : "info");
    this.noColor = options.noColor ?? process.env.NO_COLOR !== undefined;
  }

  private createEntry(level: LogLevel, message: string, data?: unknown): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (data instanceof Error) {
      entry.stack = data.stack;
    }

    return entry;
  }

  private formatConsoleOutput(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = this.noColor
      ? `${levelStr} ${entry.message}`
      : `${levelColors[entry.level]}${levelStr}\x1b[0m ${entry.message}`;

    if (entry.data !== undefined && !(entry.data instanceof Error)) {
      output += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.stack) {
      output += `\n${entry.stack}`;
    }

    return output;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    // Errors are never filtered
    if (level !== "error" && LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    if (level === "debug" && !this.debugMode) {
      return;
    }

    const output = this.formatConsoleOutput(this.createEntry(level, message, data));

    if (level === "error") {
      console.error(output);
    } else if (level === "warn") {
      console.warn(output);
    } else {
      console.log(output);
    }
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

  error(message: string, error?: Error | unknown): void {
    this.log("error", message, error);
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
    if (enabled) {
      this.minLevel = "debug";
    } else if (this.minLevel === "debug") {
      this.minLevel = "info";
    }
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

export function createLogger(options?: LoggerOptions): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(options);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

// Error tracking utilities
export interface ErrorContext {
  component?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

export function trackError(error: Error, context?: ErrorContext): void {
  const logger = getLogger();
  const message = context?.component ? `[${context.component}] ${error.message}` : error.message;

  logger.error(message, {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
  });
}

export function createErrorTracker(component: string) {
  return (error: Error, action?: string, metadata?: Record<string, unknown>) => {
    trackError(error, { component, action, metadata });
  };
}

export { Logger };
export default getLogger;

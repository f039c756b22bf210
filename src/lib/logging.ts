/**
 * Category logger shared by the engine controller, the console and the
 * browser front end.
 *
 * Levels below the configured minimum are dropped; the minimum can be set
 * globally or per category.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export enum LogCategory {
  ENGINE = "engine",
  SESSION = "session",
  CONSOLE = "console",
  RENDERING = "rendering",
  INPUT = "input",
  CONFIG = "config",
}

export type LogSink = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export interface LoggerConfig {
  globalLevel: LogLevel;
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;
  useColors: boolean;
  showTimestamps: boolean;
  sink: LogSink;
}

const DEFAULT_CONFIG: LoggerConfig = {
  globalLevel: LogLevel.INFO,
  categoryLevels: {},
  useColors: false,
  showTimestamps: false,
  sink: console,
};

const COLORS = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: COLORS.gray,
  [LogLevel.INFO]: COLORS.blue,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.ERROR]: COLORS.red,
  [LogLevel.NONE]: COLORS.reset,
};

const CATEGORY_COLORS: Record<LogCategory, string> = {
  [LogCategory.ENGINE]: COLORS.magenta,
  [LogCategory.SESSION]: COLORS.cyan,
  [LogCategory.CONSOLE]: COLORS.green,
  [LogCategory.RENDERING]: COLORS.blue,
  [LogCategory.INPUT]: COLORS.yellow,
  [LogCategory.CONFIG]: COLORS.gray,
};

let currentConfig: LoggerConfig = { ...DEFAULT_CONFIG };

export function configureLogging(config: Partial<LoggerConfig>): void {
  currentConfig = {
    ...currentConfig,
    ...config,
    categoryLevels: {
      ...currentConfig.categoryLevels,
      ...(config.categoryLevels ?? {}),
    },
  };
}

export function resetLogging(): void {
  currentConfig = { ...DEFAULT_CONFIG, categoryLevels: {} };
}

export function parseLogLevel(name: string): LogLevel {
  switch (name.toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    case "none":
      return LogLevel.NONE;
    default:
      throw new Error(`Unknown log level: ${name}`);
  }
}

function shouldLog(level: LogLevel, category: LogCategory): boolean {
  const minimumLevel =
    currentConfig.categoryLevels[category] ?? currentConfig.globalLevel;
  return level !== LogLevel.NONE && level >= minimumLevel;
}

export function formatLogMessage(
  level: LogLevel,
  category: LogCategory,
  message: string
): string {
  const { useColors, showTimestamps } = currentConfig;
  const levelName = LogLevel[level].padEnd(5);
  const parts: string[] = [];

  if (showTimestamps) {
    const timestamp = new Date().toISOString();
    parts.push(useColors ? `${COLORS.dim}${timestamp}${COLORS.reset}` : timestamp);
  }

  if (useColors) {
    parts.push(`${LEVEL_COLORS[level]}${COLORS.bright}${levelName}${COLORS.reset}`);
    parts.push(`${CATEGORY_COLORS[category]}[${category}]${COLORS.reset}`);
  } else {
    parts.push(levelName);
    parts.push(`[${category}]`);
  }

  return `${parts.join(" ")} ${message}`;
}

export class Logger {
  constructor(private readonly category: LogCategory) {}

  debug(message: string, ...args: unknown[]): void {
    if (!shouldLog(LogLevel.DEBUG, this.category)) return;
    currentConfig.sink.debug(formatLogMessage(LogLevel.DEBUG, this.category, message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (!shouldLog(LogLevel.INFO, this.category)) return;
    currentConfig.sink.info(formatLogMessage(LogLevel.INFO, this.category, message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!shouldLog(LogLevel.WARN, this.category)) return;
    currentConfig.sink.warn(formatLogMessage(LogLevel.WARN, this.category, message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!shouldLog(LogLevel.ERROR, this.category)) return;
    currentConfig.sink.error(formatLogMessage(LogLevel.ERROR, this.category, message), ...args);
  }
}

export const createLogger = (category: LogCategory) => new Logger(category);

/**
 * Colored logging for hosts embedding the reporting core
 */

import pc from "picocolors";

/** Log level type */
export type LogLevel = "success" | "error" | "warning" | "info" | "debug" | "default";

/** Maximum length for error messages before truncation */
const MAX_ERROR_LENGTH = 1000;

/** Environment variable that turns on debug output */
export const DEBUG_ENV = "WORKLOG_DEBUG";

/** Options for formatError */
export interface FormatErrorOptions {
  /** Include stack trace for Error objects (default: false) */
  showStack?: boolean;
}

function truncateError(str: string): string {
  if (str.length <= MAX_ERROR_LENGTH) {
    return str;
  }
  return str.slice(0, MAX_ERROR_LENGTH - 3) + "...";
}

/**
 * Render any thrown value as a single message
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const { showStack = false } = options;

  if (error instanceof Error) {
    if (showStack && error.stack) {
      return truncateError(error.stack);
    }
    return truncateError(`${error.name}: ${error.message}`);
  }

  if (typeof error === "string") {
    return truncateError(error);
  }

  try {
    return truncateError(JSON.stringify(error) ?? String(error));
  } catch {
    return truncateError(String(error));
  }
}

/** Logger options */
export interface LoggerOptions {
  /** Include an ISO timestamp (default: false) */
  timestamp?: boolean;
  /** Include log level prefix (default: true) */
  prefix?: boolean;
  /** Use ASCII prefixes instead of Unicode symbols (default: false) */
  useAscii?: boolean;
  /** Component name shown as "[scope]" */
  scope?: string;
}

const asciiPrefixMap: Record<LogLevel, string> = {
  success: "[OK]",
  error: "[ERR]",
  warning: "[WARN]",
  info: "[INFO]",
  debug: "[DEBUG]",
  default: "",
};

const unicodePrefixMap: Record<LogLevel, string> = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "ℹ",
  debug: "·",
  default: "",
};

function colorize(message: string, level: LogLevel): string {
  switch (level) {
    case "success":
      return pc.green(message);
    case "error":
      return pc.red(message);
    case "warning":
      return pc.yellow(message);
    case "info":
      return pc.cyan(message);
    case "debug":
      return pc.dim(message);
    case "default":
      return message;
  }
}

/**
 * Whether debug lines are printed
 */
export function isDebugEnabled(): boolean {
  const value = process.env[DEBUG_ENV];
  return value !== undefined && value !== "" && value !== "0";
}

/**
 * Build the line for a message without printing it
 */
export function formatLine(
  level: LogLevel,
  message: string,
  options: LoggerOptions = {}
): string {
  const { timestamp = false, prefix = true, useAscii = false, scope } = options;
  const parts: string[] = [];

  if (timestamp) {
    parts.push(pc.gray(`[${new Date().toISOString()}]`));
  }
  if (scope) {
    parts.push(pc.gray(`[${scope}]`));
  }

  const mainParts: string[] = [];
  if (prefix && level !== "default") {
    mainParts.push((useAscii ? asciiPrefixMap : unicodePrefixMap)[level]);
  }
  mainParts.push(message);
  parts.push(colorize(mainParts.join(" "), level));

  return parts.join(" ");
}

function log(level: LogLevel, message: string, options: LoggerOptions = {}): void {
  if (level === "debug" && !isDebugEnabled()) {
    return;
  }

  const output = formatLine(level, message, options);

  // stderr for anything diagnostic, stdout for report output
  if (level === "error" || level === "warning" || level === "debug") {
    console.error(output);
  } else {
    console.log(output);
  }
}

export function success(message: string, options?: LoggerOptions): void {
  log("success", message, options);
}

export function error(message: string, options?: LoggerOptions): void {
  log("error", message, options);
}

export function warning(message: string, options?: LoggerOptions): void {
  log("warning", message, options);
}

export function info(message: string, options?: LoggerOptions): void {
  log("info", message, options);
}

export function debug(message: string, options?: LoggerOptions): void {
  log("debug", message, options);
}

/**
 * Log a message with no colorization
 */
export function plain(message: string, options?: LoggerOptions): void {
  log("default", message, options);
}

/** Logger instance type */
export type Logger = Record<
  "success" | "error" | "warning" | "info" | "debug" | "plain",
  (message: string, options?: LoggerOptions) => void
>;

/**
 * Create a logger with default options, e.g. a fixed scope
 */
export function createLogger(defaultOptions: LoggerOptions = {}): Logger {
  const bind =
    (fn: (message: string, options?: LoggerOptions) => void) =>
    (message: string, options?: LoggerOptions) =>
      fn(message, { ...defaultOptions, ...options });

  return {
    success: bind(success),
    error: bind(error),
    warning: bind(warning),
    info: bind(info),
    debug: bind(debug),
    plain: bind(plain),
  };
}

// Default logger instance
export const logger: Logger = {
  success,
  error,
  warning,
  info,
  debug,
  plain,
};

/**
 * Logger Configuration
 * Defines configuration and parsing helpers for the shell logger
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export interface FileTransportConfig {
  enabled: boolean;
  path: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  file?: FileTransportConfig;
  source?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/**
 * Default logger configuration. Shell output owns stdout, so logs stay
 * quiet unless asked for.
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: "warn",
  format: "pretty",
  file: {
    enabled: false,
    path: "./logs/vfs-shell.log",
  },
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    file: config.file ? { ...DEFAULT_CONFIG.file, ...config.file } : DEFAULT_CONFIG.file,
  };
}

/**
 * Validate log level
 */
export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((known) => known === level);
}

/**
 * Parse log level from environment or flags
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return DEFAULT_CONFIG.level;
  if (isValidLogLevel(level)) return level;
  console.warn(`Invalid log level "${level}", using default "${DEFAULT_CONFIG.level}"`);
  return DEFAULT_CONFIG.level;
}

/**
 * Parse log format from environment or flags
 */
export function parseLogFormat(format: string | undefined): LogFormat {
  if (!format) return DEFAULT_CONFIG.format;
  if (format === "json" || format === "pretty") return format;
  console.warn(`Invalid log format "${format}", using default "${DEFAULT_CONFIG.format}"`);
  return DEFAULT_CONFIG.format;
}

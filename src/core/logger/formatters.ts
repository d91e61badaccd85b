/**
 * Logger Formatters
 * Pino formatters for structured logging
 */

import pino from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration
 */
export function createFormatter(config: LoggerConfig): pino.LoggerOptions["formatters"] {
  return {
    level: (label: string) => {
      return { level: label };
    },

    log: (obj: Record<string, unknown>) => {
      if (config.source) {
        return { ...obj, source: config.source };
      }
      return obj;
    },
  };
}

/**
 * Trim long argument lists before they land in a log line
 */
export function summarizeArgs(args: readonly string[], maxArgs = 10, maxLength = 200): string[] {
  const shown = args.slice(0, maxArgs).map((arg) => (arg.length > maxLength ? `${arg.slice(0, maxLength)}…` : arg));
  if (args.length > maxArgs) {
    shown.push(`(${args.length - maxArgs} more)`);
  }
  return shown;
}

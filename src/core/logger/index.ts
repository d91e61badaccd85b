/**
 * Shell logging entry point.
 *
 * The CLI creates the logger; library code receives one explicitly.
 */

import { EventBus } from "../eventBus";
import { LoggerConfig } from "./config";
import { ShellLogger } from "./logger";

export { ShellLogger } from "./logger";
export type { LoggerContext, LoggerOptions } from "./logger";
export * from "./config";

/**
 * Create the process logger; the CLI calls this once per command
 */
export function initializeLogger(eventBus: EventBus | undefined, config: Partial<LoggerConfig> = {}): ShellLogger {
  return new ShellLogger(config, { eventBus });
}

/**
 * Logger that drops everything; the default for components built without one
 */
export function createSilentLogger(): ShellLogger {
  return new ShellLogger({ level: "silent" }, { destination: { write: () => undefined } });
}

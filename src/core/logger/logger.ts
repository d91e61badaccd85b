/**
 * Shell Logger - Pino-based structured logging
 *
 * - writes to stderr so stdout carries only shell output
 * - pretty output for terminals, JSON lines otherwise
 * - optional JSON file destination
 * - mirrors EventBus traffic at debug level
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { EventBus, EventType } from "../eventBus";
import { LoggerConfig, LogLevel, createLoggerConfig } from "./config";
import { createFormatter, summarizeArgs } from "./formatters";

export interface LoggerContext {
  sessionId?: string;
  command?: string;
  path?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  eventBus?: EventBus;
  /** Replaces the configured outputs, e.g. to capture lines in tests. */
  destination?: pino.DestinationStream;
}

function streamLevel(level: LogLevel): pino.Level {
  return level === "silent" ? "fatal" : level;
}

export class ShellLogger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;
  private options: LoggerOptions;

  constructor(config: Partial<LoggerConfig> = {}, options: LoggerOptions = {}, base?: pino.Logger) {
    this.config = createLoggerConfig(config);
    this.options = options;
    this.pinoLogger = base ?? pino(
      {
        level: this.config.level,
        formatters: createFormatter(this.config),
        serializers: {
          err: pino.stdSerializers.err,
        },
      },
      pino.multistream(this.createStreams())
    );

    if (options.eventBus) {
      this.setupEventBusIntegration(options.eventBus);
    }
  }

  private createStreams(): pino.StreamEntry[] {
    const level = streamLevel(this.config.level);

    if (this.options.destination) {
      return [{ level, stream: this.options.destination }];
    }

    const streams: pino.StreamEntry[] = [];

    if (this.config.format === "pretty") {
      streams.push({
        level,
        stream: pinoPretty({
          colorize: Boolean(process.stderr.isTTY),
          translateTime: "SYS:standard",
          ignore: "pid,hostname,source",
          destination: 2,
          sync: true,
        }),
      });
    } else {
      streams.push({ level, stream: pino.destination({ dest: 2, sync: true }) });
    }

    if (this.config.file?.enabled) {
      streams.push({
        level,
        stream: pino.destination({ dest: this.config.file.path, mkdir: true, sync: true }),
      });
    }

    return streams;
  }

  /**
   * Create child logger with context
   */
  child(context: LoggerContext): ShellLogger {
    return new ShellLogger(this.config, { destination: this.options.destination }, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  /**
   * Command execution tracing
   */
  traceCommand(verb: string, args: readonly string[], duration: number, success: boolean): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        command: verb,
        args: summarizeArgs(args),
        duration,
        success,
        type: "command",
      },
      `Command ${verb} ${success ? "succeeded" : "failed"} (${duration}ms)`
    );
  }

  flush(): void {
    this.pinoLogger.flush();
  }

  /**
   * Mirror EventBus traffic into the log
   */
  private setupEventBusIntegration(eventBus: EventBus): void {
    const messages: Record<EventType, string> = {
      VfsLoadEvent: "VFS loaded",
      CommandEvent: "Command dispatched",
      CommandErrorEvent: "Command failed",
      CwdChangeEvent: "Current directory changed",
      ScriptEvent: "Script playback",
    };

    eventBus.on("any", (evt) => {
      this.pinoLogger.debug(
        {
          event: evt.type,
          payload: evt.payload,
          type: "eventbus",
          correlationId: evt.id,
        },
        messages[evt.type]
      );
    });
  }
}

/**
 * Command dispatcher:
 * - register verb handlers
 * - tokenize a command line and run the matching handler
 * - turn every failure into an output line; nothing reaches the session
 */

import { EventBus } from "../eventBus";
import {
  CommandNotFoundError,
  NotADirectoryError,
  PathNotFoundError,
  ShellError,
  errorMessage,
} from "../errors";
import { ShellLogger, createSilentLogger } from "../logger";
import { CommandHandler, DispatchResult, OutputSink } from "../types";
import { VFS } from "../vfs";
import { tokenize } from "./tokenizer";

export interface DispatcherOptions {
  logger?: ShellLogger;
  eventBus?: EventBus;
}

export class CommandDispatcher {
  private commands: Map<string, CommandHandler> = new Map();
  private logger: ShellLogger;
  private eventBus?: EventBus;

  constructor(private vfs: VFS, private out: OutputSink, options: DispatcherOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.eventBus = options.eventBus;
  }

  register(handler: CommandHandler) {
    if (this.commands.has(handler.name)) {
      throw new Error(`Command already registered: ${handler.name}`);
    }
    this.commands.set(handler.name, handler);
  }

  list(): CommandHandler[] {
    return Array.from(this.commands.values());
  }

  execute(line: string): DispatchResult {
    let tokens: string[];
    try {
      tokens = tokenize(line);
    } catch (err) {
      return this.fail(err);
    }

    if (tokens.length === 0) return { outcome: "continue" };

    const [verb, ...args] = tokens;
    const handler = this.commands.get(verb);
    if (!handler) {
      return this.fail(new CommandNotFoundError(verb), verb);
    }

    this.eventBus?.emit("CommandEvent", { verb, args, cwd: this.vfs.currentDirectory });
    const start = Date.now();

    try {
      const outcome = handler.run({ vfs: this.vfs, args, out: this.out }) ?? "continue";
      this.logger.traceCommand(verb, args, Date.now() - start, true);
      return { outcome, verb };
    } catch (err) {
      this.logger.traceCommand(verb, args, Date.now() - start, false);
      return this.fail(err, verb);
    }
  }

  private fail(err: unknown, verb?: string): DispatchResult {
    const error =
      err instanceof ShellError
        ? err
        : new ShellError(errorMessage(err), "INTERNAL_ERROR", { cause: errorMessage(err) });

    if (!(err instanceof ShellError)) {
      this.logger.error(err instanceof Error ? err : error, { command: verb });
    }

    const namesTarget = error instanceof PathNotFoundError || error instanceof NotADirectoryError;
    const message = verb && (namesTarget || error.code === "INTERNAL_ERROR") ? `${verb}: ${error.message}` : error.message;

    this.out.write(message);
    this.eventBus?.emit("CommandErrorEvent", { verb, code: error.code, message });
    return { outcome: "continue", verb, error };
  }
}

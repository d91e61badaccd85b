/**
 * Core type definitions for the shell
 */

import { ShellError } from "../errors";
import { VFS } from "../vfs";

/**
 * Line-oriented output target. Each call prints one logical line; the text
 * itself may hold embedded newlines (file contents, trees).
 */
export interface OutputSink {
  write(line: string): void;
}

/**
 * What the session loop does after a command
 */
export type CommandOutcome = "continue" | "exit";

export interface CommandContext {
  vfs: VFS;
  args: string[];
  out: OutputSink;
}

/**
 * CommandHandler - a shell verb
 */
export interface CommandHandler {
  name: string;
  /** Returning nothing means "continue". */
  run(ctx: CommandContext): CommandOutcome | void;
}

export interface DispatchResult {
  outcome: CommandOutcome;
  verb?: string;
  error?: ShellError;
}

export function createStreamSink(stream: NodeJS.WritableStream): OutputSink {
  return {
    write(line: string) {
      stream.write(`${line}\n`);
    },
  };
}

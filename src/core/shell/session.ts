/**
 * Shell session: startup banner, script playback and the interactive loop.
 *
 * Commands run strictly one after another; a command's output and any
 * directory change are complete before the next line is read.
 */

import fs from "fs";
import readline from "readline";
import { EventBus } from "../eventBus";
import { CommandParseError, errorMessage } from "../errors";
import { ShellLogger, createSilentLogger } from "../logger";
import { DispatchResult, OutputSink } from "../types";
import { VFS } from "../vfs";
import { registerBuiltinCommands } from "./commands";
import { CommandDispatcher } from "./dispatcher";
import { ShellIdentity, formatPrompt } from "./prompt";

export const EXIT_MESSAGE = "Exiting shell";
export const INTERRUPT_HINT = "Use 'exit' to leave the shell";

export interface SessionConfig {
  identity: ShellIdentity;
  vfsPath?: string;
  startupScript?: string;
}

export interface SessionOptions {
  logger?: ShellLogger;
  eventBus?: EventBus;
}

export class ShellSession {
  readonly dispatcher: CommandDispatcher;
  private running = true;
  private logger: ShellLogger;
  private eventBus?: EventBus;

  constructor(
    readonly vfs: VFS,
    private out: OutputSink,
    private config: SessionConfig,
    options: SessionOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.eventBus = options.eventBus;
    this.dispatcher = new CommandDispatcher(vfs, out, { logger: this.logger, eventBus: this.eventBus });
    registerBuiltinCommands(this.dispatcher);
  }

  get isRunning(): boolean {
    return this.running;
  }

  prompt(): string {
    return formatPrompt(this.config.identity, this.vfs.currentDirectory);
  }

  executeLine(line: string): DispatchResult {
    const result = this.dispatcher.execute(line);
    if (result.outcome === "exit") this.running = false;
    return result;
  }

  /**
   * Play back script lines as if typed. Blank lines and "#" comments are
   * skipped; returns the number of commands run.
   */
  runLines(lines: readonly string[]): number {
    let executed = 0;

    for (const [index, raw] of lines.entries()) {
      if (!this.running) break;

      const line = raw.trim();
      if (!line || line.startsWith("#")) continue;

      this.out.write(`${this.prompt()}${line}`);
      const result = this.executeLine(line);
      executed++;

      if (result.error instanceof CommandParseError) {
        this.out.write(`Line ${index + 1}: parse error, skipped`);
      }
      this.out.write("");
    }

    return executed;
  }

  runScript(scriptPath: string): void {
    if (!fs.existsSync(scriptPath)) {
      this.out.write(`Error: script '${scriptPath}' not found`);
      this.eventBus?.emit("ScriptEvent", { path: scriptPath, status: "missing" });
      return;
    }

    this.out.write("");
    this.out.write(`Running script: ${scriptPath}`);
    this.eventBus?.emit("ScriptEvent", { path: scriptPath, status: "started" });

    try {
      const lines = fs.readFileSync(scriptPath, "utf8").split(/\r?\n/);
      const commands = this.runLines(lines);
      this.out.write("Script finished");
      this.eventBus?.emit("ScriptEvent", { path: scriptPath, status: "finished", commands });
    } catch (err) {
      this.logger.error(err instanceof Error ? err : errorMessage(err), { path: scriptPath });
      this.out.write(`Error while running script: ${errorMessage(err)}`);
    }
  }

  handleInterrupt(): void {
    this.out.write("");
    this.out.write(INTERRUPT_HINT);
  }

  /**
   * Read commands from `input` until `exit` or end of input
   */
  runInteractive(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input, output });

      const showPrompt = () => {
        rl.setPrompt(this.prompt());
        rl.prompt();
      };

      rl.on("line", (raw: string) => {
        if (!this.running) return;
        const line = raw.trim();
        if (line) {
          this.executeLine(line);
          if (!this.running) {
            rl.close();
            return;
          }
        }
        showPrompt();
      });

      rl.on("SIGINT", () => {
        this.handleInterrupt();
        showPrompt();
      });

      rl.on("close", () => {
        if (this.running) {
          this.running = false;
          this.out.write("");
          this.out.write(EXIT_MESSAGE);
        }
        resolve();
      });

      showPrompt();
    });
  }

  printBanner(): void {
    this.out.write("Shell emulator configuration");
    this.out.write(`VFS path: ${this.config.vfsPath ?? "not set (using default VFS)"}`);
    this.out.write(`Startup script: ${this.config.startupScript ?? "not set"}`);
    this.out.write("=".repeat(40));
  }

  printInteractiveHeader(): void {
    this.out.write("");
    this.out.write("Interactive mode");
    this.out.write(`Available commands: ${this.dispatcher.list().map((c) => c.name).join(", ")}`);
    this.out.write("Type 'exit' to quit");
    this.out.write("-".repeat(50));
  }

  /**
   * Banner, startup script, then the interactive loop unless the script
   * already ran `exit`.
   */
  async start(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
    this.printBanner();

    if (this.config.startupScript) {
      this.runScript(this.config.startupScript);
    }

    if (!this.running) return;

    this.printInteractiveHeader();
    await this.runInteractive(input, output);
  }
}

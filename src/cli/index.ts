#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { errorMessage } from "../core/errors";
import { inspectCommand } from "./commands/inspect";
import { shellCommand } from "./commands/shell";

export const VERSION = "1.0.0";

export function createCli(): Command {
  const program = new Command();

  program
    .name("vfs-shell")
    .description("Shell emulator over an in-memory virtual filesystem")
    .version(VERSION);

  program.addCommand(shellCommand(), { isDefault: true });
  program.addCommand(inspectCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error("Fatal error:", errorMessage(err));
      process.exit(1);
    });
}

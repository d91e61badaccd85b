/**
 * src/cli/commands/shell.ts
 * vfs-shell [shell] --vfs-path <file> --startup-script <file>
 */

import { Command } from "commander";
import { ulid } from "ulid";
import { EventBus } from "../../core/eventBus";
import { errorMessage } from "../../core/errors";
import { initializeLogger } from "../../core/logger";
import { ShellSession } from "../../core/shell/session";
import { createStreamSink } from "../../core/types";
import { VFS, loadVfs } from "../../core/vfs";
import { CliFlags, loadConfig, resolveSettings } from "../utils/loadConfig";

export interface ShellIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

/**
 * Wire config, logging, the VFS and a session, then run until exit
 */
export async function runShell(flags: CliFlags, io: ShellIO): Promise<void> {
  const settings = resolveSettings(flags, io.env, loadConfig(io.cwd));
  const eventBus = new EventBus();
  const logger = initializeLogger(eventBus, { ...settings.logger, source: "shell" });
  const out = createStreamSink(io.output);

  const loaded = loadVfs(settings.vfsPath, { logger, eventBus });
  loaded.messages.forEach((message) => out.write(message));

  const session = new ShellSession(
    new VFS(loaded.root, eventBus),
    out,
    {
      identity: settings.identity,
      vfsPath: settings.vfsPath,
      startupScript: settings.startupScript,
    },
    { logger: logger.child({ sessionId: ulid() }), eventBus }
  );

  logger.debug("Session starting", { origin: loaded.origin, user: settings.identity.user });
  await session.start(io.input, io.output);
  logger.flush();
}

export function shellCommand(): Command {
  const cmd = new Command("shell");
  cmd
    .description("Start the shell (default command)")
    .option("--vfs-path <path>", "JSON document describing the VFS (default: built-in tree)")
    .option("--startup-script <path>", "commands to run before the interactive prompt")
    .option("--user <name>", "user name shown in the prompt")
    .option("--host <name>", "host name shown in the prompt")
    .option("--log-level <level>", "fatal|error|warn|info|debug|trace|silent")
    .option("--log-format <format>", "pretty|json")
    .option("--log-file <path>", "also write JSON logs to this file")
    .action(async (opts: CliFlags) => {
      try {
        await runShell(opts, {
          input: process.stdin,
          output: process.stdout,
          env: process.env,
          cwd: process.cwd(),
        });
      } catch (e) {
        console.error("Failed to start shell:", errorMessage(e));
        process.exit(1);
      }
    });

  return cmd;
}

/**
 * src/cli/utils/loadConfig.ts
 *
 * Settings precedence: CLI flags > environment > vfs-shell.config.json > defaults
 */

import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError, errorMessage } from "../../core/errors";
import { LoggerConfig, parseLogFormat, parseLogLevel } from "../../core/logger";
import { ShellIdentity } from "../../core/shell/prompt";

export const CONFIG_FILE = "vfs-shell.config.json";

export const ShellConfigFileSchema = z
  .object({
    vfsPath: z.string().min(1).optional(),
    startupScript: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    logger: z
      .object({
        level: z.string().optional(),
        format: z.string().optional(),
        file: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ShellConfigFile = z.infer<typeof ShellConfigFileSchema>;

export interface CliFlags {
  vfsPath?: string;
  startupScript?: string;
  user?: string;
  host?: string;
  logLevel?: string;
  logFormat?: string;
  logFile?: string;
}

export interface ShellSettings {
  vfsPath?: string;
  startupScript?: string;
  identity: ShellIdentity;
  logger: Partial<LoggerConfig>;
}

/**
 * Read vfs-shell.config.json from `cwd`; a missing file is an empty config
 * @throws ConfigError on unreadable JSON or unknown/mistyped keys
 */
export function loadConfig(cwd: string = process.cwd()): ShellConfigFile {
  const p = path.join(cwd, CONFIG_FILE);
  if (!fs.existsSync(p)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE}: ${errorMessage(err)}`, { path: p });
  }

  const parsed = ShellConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`${CONFIG_FILE}: ${issues}`, { path: p });
  }
  return parsed.data;
}

export function detectIdentity(): ShellIdentity {
  let user: string;
  try {
    user = os.userInfo().username;
  } catch {
    // no passwd entry for the uid (e.g. some containers)
    user = process.env.USER ?? "user";
  }
  return { user, host: os.hostname() };
}

export function resolveSettings(
  flags: CliFlags,
  env: NodeJS.ProcessEnv,
  file: ShellConfigFile,
  identity: () => ShellIdentity = detectIdentity
): ShellSettings {
  const user = flags.user ?? env.SHELL_USER ?? file.user;
  const host = flags.host ?? env.SHELL_HOST ?? file.host;
  const detected = user && host ? undefined : identity();
  const logFile = flags.logFile ?? env.LOG_FILE_PATH ?? file.logger?.file;

  return {
    vfsPath: flags.vfsPath ?? env.VFS_PATH ?? file.vfsPath,
    startupScript: flags.startupScript ?? env.STARTUP_SCRIPT ?? file.startupScript,
    identity: {
      user: user ?? detected?.user ?? "user",
      host: host ?? detected?.host ?? "localhost",
    },
    logger: {
      level: parseLogLevel(flags.logLevel ?? env.LOG_LEVEL ?? file.logger?.level),
      format: parseLogFormat(flags.logFormat ?? env.LOG_FORMAT ?? file.logger?.format),
      file: logFile ? { enabled: true, path: logFile } : undefined,
    },
  };
}

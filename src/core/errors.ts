/**
 * Custom error types for the shell emulator
 */

export class ShellError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ShellError";
    Object.setPrototypeOf(this, ShellError.prototype);
  }
}

export class PathNotFoundError extends ShellError {
  constructor(public target: string) {
    super(
      `${target}: No such file or directory`,
      "PATH_NOT_FOUND",
      { target }
    );
    this.name = "PathNotFoundError";
    Object.setPrototypeOf(this, PathNotFoundError.prototype);
  }
}

export class NotADirectoryError extends ShellError {
  constructor(public target: string) {
    super(
      `${target}: Not a directory`,
      "NOT_A_DIRECTORY",
      { target }
    );
    this.name = "NotADirectoryError";
    Object.setPrototypeOf(this, NotADirectoryError.prototype);
  }
}

export class ContentDecodeError extends ShellError {
  constructor(reason: string) {
    super(reason, "CONTENT_DECODE_ERROR", { reason });
    this.name = "ContentDecodeError";
    Object.setPrototypeOf(this, ContentDecodeError.prototype);
  }
}

export class CommandParseError extends ShellError {
  constructor(reason: string, public line: string) {
    super(`Parse error: ${reason}`, "COMMAND_PARSE_ERROR", { reason, line });
    this.name = "CommandParseError";
    Object.setPrototypeOf(this, CommandParseError.prototype);
  }
}

export class CommandNotFoundError extends ShellError {
  constructor(public verb: string) {
    super(`${verb}: command not found`, "COMMAND_NOT_FOUND", { verb });
    this.name = "CommandNotFoundError";
    Object.setPrototypeOf(this, CommandNotFoundError.prototype);
  }
}

export class MissingOperandError extends ShellError {
  constructor(public verb: string) {
    super(`${verb}: missing operand`, "MISSING_OPERAND", { verb });
    this.name = "MissingOperandError";
    Object.setPrototypeOf(this, MissingOperandError.prototype);
  }
}

export class VfsSourceError extends ShellError {
  constructor(message: string, public source?: string) {
    super(message, "VFS_SOURCE_ERROR", { source });
    this.name = "VfsSourceError";
    Object.setPrototypeOf(this, VfsSourceError.prototype);
  }
}

export class ConfigError extends ShellError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, "CONFIG_ERROR", details);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

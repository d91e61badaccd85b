/**
 * Built-in shell commands
 */

import { MissingOperandError } from "../errors";
import { CommandContext } from "../types";
import { CommandDispatcher } from "./dispatcher";

function notFound(verb: string, target: string): string {
  return `${verb}: ${target}: No such file or directory`;
}

function cannotAccess(verb: string, target: string): string {
  return `${verb}: cannot access '${target}': No such file or directory`;
}

function requireOperands(verb: string, { args }: CommandContext): void {
  if (args.length === 0) throw new MissingOperandError(verb);
}

/**
 * Register all built-in commands to the dispatcher
 */
export function registerBuiltinCommands(dispatcher: CommandDispatcher) {
  dispatcher.register({
    name: "ls",
    run: ({ vfs, args, out }) => {
      const target = args[0] ?? vfs.currentDirectory;
      const listing = vfs.query.listDirectory(vfs.resolve(target));
      if (!listing) {
        out.write(cannotAccess("ls", target));
        return;
      }
      listing.forEach((name) => out.write(name));
    },
  });

  dispatcher.register({
    name: "cd",
    run: ({ vfs, args }) => {
      vfs.changeDirectory(args[0]);
    },
  });

  dispatcher.register({
    name: "cat",
    run: (ctx) => {
      requireOperands("cat", ctx);
      const { vfs, args, out } = ctx;
      for (const arg of args) {
        const content = vfs.query.readFile(vfs.resolve(arg));
        out.write(content ?? notFound("cat", arg));
      }
    },
  });

  dispatcher.register({
    name: "pwd",
    run: ({ vfs, out }) => {
      out.write(vfs.currentDirectory);
    },
  });

  dispatcher.register({
    name: "echo",
    run: ({ args, out }) => {
      out.write(args.join(" "));
    },
  });

  dispatcher.register({
    name: "wc",
    run: (ctx) => {
      requireOperands("wc", ctx);
      const { vfs, args, out } = ctx;
      for (const arg of args) {
        const stats = vfs.query.fileStats(vfs.resolve(arg));
        out.write(stats ? `${stats.lines} ${stats.words} ${stats.bytes} ${arg}` : notFound("wc", arg));
      }
    },
  });

  dispatcher.register({
    name: "du",
    run: ({ vfs, args, out }) => {
      const target = args[0] === undefined ? vfs.currentDirectory : vfs.resolve(args[0]);
      const size = vfs.query.directorySize(target);
      out.write(size === undefined ? cannotAccess("du", target) : `${size}\t${target}`);
    },
  });

  dispatcher.register({
    name: "tree",
    run: ({ vfs, args, out }) => {
      const target = args[0] === undefined ? vfs.currentDirectory : vfs.resolve(args[0]);
      const rendered = vfs.query.renderTree(target);
      out.write(rendered === undefined ? `tree: ${target} [error opening dir]` : rendered.replace(/\n$/, ""));
    },
  });

  dispatcher.register({
    name: "exit",
    run: ({ out }) => {
      out.write("Exiting shell");
      return "exit";
    },
  });
}

/**
 * Command dispatcher and built-in command tests
 */

import { EventBus } from "../src/core/eventBus";
import { CommandNotFoundError, CommandParseError, MissingOperandError } from "../src/core/errors";
import { registerBuiltinCommands } from "../src/core/shell/commands";
import { CommandDispatcher } from "../src/core/shell/dispatcher";
import { VFS } from "../src/core/vfs";
import { captureSink, dir, file, sampleTree } from "./helpers";

describe("CommandDispatcher", () => {
  let vfs: VFS;
  let out: ReturnType<typeof captureSink>;
  let eventBus: EventBus;
  let dispatcher: CommandDispatcher;

  function run(line: string): string[] {
    out.lines.length = 0;
    dispatcher.execute(line);
    return [...out.lines];
  }

  beforeEach(() => {
    vfs = new VFS(sampleTree());
    out = captureSink();
    eventBus = new EventBus();
    dispatcher = new CommandDispatcher(vfs, out, { eventBus });
    registerBuiltinCommands(dispatcher);
  });

  describe("dispatching", () => {
    test("blank lines do nothing", () => {
      expect(dispatcher.execute("   ")).toEqual({ outcome: "continue" });
      expect(out.lines).toEqual([]);
    });

    test("unknown verbs report command not found", () => {
      const result = dispatcher.execute("frobnicate now");
      expect(out.lines).toEqual(["frobnicate: command not found"]);
      expect(result.outcome).toBe("continue");
      expect(result.error).toBeInstanceOf(CommandNotFoundError);
    });

    test("parse failures are reported and the session continues", () => {
      const result = dispatcher.execute(`echo "unterminated`);
      expect(out.lines).toEqual(["Parse error: no closing quotation"]);
      expect(result.outcome).toBe("continue");
      expect(result.error).toBeInstanceOf(CommandParseError);
    });

    test("rejects duplicate registrations", () => {
      expect(() =>
        dispatcher.register({ name: "ls", run: () => undefined })
      ).toThrow("Command already registered: ls");
    });

    test("help is not a command", () => {
      expect(run("help")).toEqual(["help: command not found"]);
    });

    test("unexpected handler errors become output lines", () => {
      dispatcher.register({
        name: "boom",
        run: () => {
          throw new Error("kaput");
        },
      });
      const result = dispatcher.execute("boom");
      expect(out.lines).toEqual(["boom: kaput"]);
      expect(result.error?.code).toBe("INTERNAL_ERROR");
    });

    test("emits command and error events", () => {
      dispatcher.execute("pwd");
      dispatcher.execute("nope");

      expect(eventBus.history.filter((e) => e.type === "CommandEvent")[0].payload).toEqual({ verb: "pwd", args: [], cwd: "/" });
      expect(eventBus.history.filter((e) => e.type === "CommandErrorEvent")[0].payload).toEqual({
        verb: "nope",
        code: "COMMAND_NOT_FOUND",
        message: "nope: command not found",
      });
    });
  });

  describe("exit", () => {
    test("stops the session", () => {
      expect(dispatcher.execute("exit").outcome).toBe("exit");
      expect(out.lines).toEqual(["Exiting shell"]);
    });
  });

  describe("ls", () => {
    test("lists the current directory by default", () => {
      expect(run("ls")).toEqual(["home", "etc", "a.txt"]);
    });

    test("lists a relative path", () => {
      vfs.changeDirectory("/home");
      expect(run("ls user")).toEqual(["documents", "file1.txt", "empty.txt"]);
    });

    test("reports missing targets and files", () => {
      expect(run("ls ghost")).toEqual(["ls: cannot access 'ghost': No such file or directory"]);
      expect(run("ls a.txt")).toEqual(["ls: cannot access 'a.txt': No such file or directory"]);
    });
  });

  describe("cd", () => {
    test("moves into a directory silently", () => {
      expect(run("cd home/user")).toEqual([]);
      expect(vfs.currentDirectory).toBe("/home/user");
    });

    test("goes to the root without an argument", () => {
      vfs.changeDirectory("/home/user");
      run("cd");
      expect(vfs.currentDirectory).toBe("/");
    });

    test("reports a missing directory and stays put", () => {
      expect(run("cd nope")).toEqual(["cd: nope: No such file or directory"]);
      expect(vfs.currentDirectory).toBe("/");
    });

    test("refuses to enter a file", () => {
      expect(run("cd a.txt")).toEqual(["cd: a.txt: Not a directory"]);
      expect(vfs.currentDirectory).toBe("/");
    });

    test("handles '..' relative to the current directory", () => {
      vfs.changeDirectory("/home/user");
      run("cd ../other");
      expect(vfs.currentDirectory).toBe("/home/other");
    });
  });

  describe("cat", () => {
    test("prints file content", () => {
      expect(run("cat a.txt")).toEqual(["hi there"]);
    });

    test("prints decoded content", () => {
      expect(run("cat /etc/motd")).toEqual(["héllo world"]);
    });

    test("handles several files and reports each missing one", () => {
      expect(run("cat a.txt nope etc/motd")).toEqual([
        "hi there",
        "cat: nope: No such file or directory",
        "héllo world",
      ]);
    });

    test("reports a directory operand as missing", () => {
      expect(run("cat home")).toEqual(["cat: home: No such file or directory"]);
    });

    test("requires an operand", () => {
      const result = dispatcher.execute("cat");
      expect(out.lines).toEqual(["cat: missing operand"]);
      expect(result.error).toBeInstanceOf(MissingOperandError);
    });
  });

  describe("pwd and echo", () => {
    test("pwd prints the current directory", () => {
      vfs.changeDirectory("/home/user");
      expect(run("pwd")).toEqual(["/home/user"]);
    });

    test("echo joins its arguments with single spaces", () => {
      expect(run(`echo hello   "big world"`)).toEqual(["hello big world"]);
      expect(run("echo")).toEqual([""]);
    });
  });

  describe("wc", () => {
    test("prints lines, words, bytes and the operand", () => {
      expect(run("wc a.txt")).toEqual(["1 2 8 a.txt"]);
    });

    test("handles several files", () => {
      expect(run("wc /home/user/file1.txt /home/user/empty.txt missing")).toEqual([
        "2 4 18 /home/user/file1.txt",
        "0 0 0 /home/user/empty.txt",
        "wc: missing: No such file or directory",
      ]);
    });

    test("requires an operand", () => {
      expect(run("wc")).toEqual(["wc: missing operand"]);
    });
  });

  describe("du", () => {
    test("sizes the current directory by default", () => {
      expect(run("du")).toEqual(["57\t/"]);
    });

    test("prints the resolved path", () => {
      vfs.changeDirectory("/home/user");
      expect(run("du documents")).toEqual(["19\t/home/user/documents"]);
    });

    test("reports missing directories by resolved path", () => {
      vfs.changeDirectory("/home");
      expect(run("du nothing")).toEqual(["du: cannot access '/home/nothing': No such file or directory"]);
    });
  });

  describe("tree", () => {
    test("renders a two-level tree", () => {
      const small = new VFS(dir({ x: file("1"), y: file("2") }));
      const smallOut = captureSink();
      const smallDispatcher = new CommandDispatcher(small, smallOut);
      registerBuiltinCommands(smallDispatcher);

      smallDispatcher.execute("tree /");

      expect(smallOut.lines).toEqual(["/\n    ├── x\n    └── y"]);
    });

    test("renders the current directory by default", () => {
      vfs.changeDirectory("/etc");
      expect(run("tree")).toEqual(["/etc\n    └── motd"]);
    });

    test("reports paths that are not directories", () => {
      expect(run("tree a.txt")).toEqual(["tree: /a.txt [error opening dir]"]);
    });
  });
});

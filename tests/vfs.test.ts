/**
 * VFS Unit Tests
 */

import { EventBus } from "../src/core/eventBus";
import { NotADirectoryError, PathNotFoundError } from "../src/core/errors";
import { VFS } from "../src/core/vfs";
import { sampleTree } from "./helpers";

describe("VFS", () => {
  let vfs: VFS;
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
    vfs = new VFS(sampleTree(), eventBus);
  });

  test("starts at the root", () => {
    expect(vfs.currentDirectory).toBe("/");
  });

  test("resolves input against the current directory", () => {
    vfs.changeDirectory("/home/user");
    expect(vfs.resolve("../other")).toBe("/home/other");
    expect(vfs.resolve("/etc")).toBe("/etc");
  });

  test("changes into existing directories", () => {
    expect(vfs.changeDirectory("home")).toBe("/home");
    expect(vfs.changeDirectory("user/documents")).toBe("/home/user/documents");
    expect(vfs.currentDirectory).toBe("/home/user/documents");
  });

  test("changes to the root without an argument", () => {
    vfs.changeDirectory("/home/user");
    expect(vfs.changeDirectory()).toBe("/");
  });

  test("rejects missing targets and keeps the current directory", () => {
    vfs.changeDirectory("/home");
    expect(() => vfs.changeDirectory("nope")).toThrow(PathNotFoundError);
    expect(() => vfs.changeDirectory("nope")).toThrow("nope: No such file or directory");
    expect(vfs.currentDirectory).toBe("/home");
  });

  test("rejects files and keeps the current directory", () => {
    expect(() => vfs.changeDirectory("a.txt")).toThrow(NotADirectoryError);
    expect(() => vfs.changeDirectory("a.txt")).toThrow("a.txt: Not a directory");
    expect(vfs.currentDirectory).toBe("/");
  });

  test("emits CwdChangeEvent only when the directory changes", () => {
    vfs.changeDirectory("/home");
    vfs.changeDirectory(".");

    const changes = eventBus.history.filter((e) => e.type === "CwdChangeEvent");
    expect(changes).toHaveLength(1);
    expect(changes[0].payload).toEqual({ from: "/", to: "/home" });
  });

  test("exposes lookups and queries", () => {
    expect(vfs.exists("/etc/motd")).toBe(true);
    expect(vfs.getNode("/etc")?.kind).toBe("directory");
    expect(vfs.query.readFile(vfs.resolve("a.txt"))).toBe("hi there");
  });
});

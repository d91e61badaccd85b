/**
 * Read-only queries over the VFS tree.
 *
 * Every operation takes an already resolved absolute path and returns
 * `undefined` when the path is missing or names the wrong kind of node.
 * Nothing here throws.
 */

import { decodeContent } from "./contentCodec";
import { childPath } from "./pathResolver";
import { TreeStore } from "./treeStore";
import { AbsolutePath, DirectoryNode, FileStats, WalkEntry, isDirectory, isFile } from "./types";

// Boundaries recognised when counting lines, "\r\n" counting as one.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;
// Word separators; U+FEFF is not one.
const WHITESPACE = /[\t-\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

const BRANCH = "├── ";
const LAST_BRANCH = "└── ";
const PIPE_INDENT = "│   ";
const SPACE_INDENT = "    ";

export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function countWords(line: string): number {
  return line.split(WHITESPACE).filter(Boolean).length;
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

export class VFSQueryEngine {
  constructor(private store: TreeStore) {}

  listDirectory(path: AbsolutePath): string[] | undefined {
    const node = this.store.getNode(path);
    if (!isDirectory(node)) return undefined;
    return Array.from(node.children.keys());
  }

  readFile(path: AbsolutePath): string | undefined {
    const node = this.store.getNode(path);
    if (!isFile(node)) return undefined;
    return decodeContent(node.content);
  }

  fileSize(path: AbsolutePath): number | undefined {
    const content = this.readFile(path);
    return content === undefined ? undefined : byteLength(content);
  }

  fileStats(path: AbsolutePath): FileStats | undefined {
    const content = this.readFile(path);
    if (content === undefined) return undefined;

    const lines = splitLines(content);
    return {
      lines: lines.length,
      words: lines.reduce((sum, line) => sum + countWords(line), 0),
      bytes: byteLength(content),
    };
  }

  /**
   * Total decoded size of every file below `path`
   */
  directorySize(path: AbsolutePath): number | undefined {
    if (!isDirectory(this.store.getNode(path))) return undefined;

    let total = 0;
    for (const entry of this.walk(path)) {
      if (entry.node.kind === "file") {
        total += this.fileSize(entry.path) ?? 0;
      }
    }
    return total;
  }

  /**
   * Depth-first traversal in declared order. Yields nothing for a missing
   * path or a file.
   */
  *walk(path: AbsolutePath): Generator<WalkEntry> {
    const node = this.store.getNode(path);
    if (!isDirectory(node)) return;

    for (const [name, child] of node.children) {
      const entryPath = childPath(path, name);
      yield { path: entryPath, name, node: child };
      if (child.kind === "directory") {
        yield* this.walk(entryPath);
      }
    }
  }

  /**
   * Render a directory as box-drawing lines, one per node, each ending with
   * "\n". The first line is `path` itself; the root counts as a last
   * sibling, so its children are indented by four spaces.
   */
  renderTree(path: AbsolutePath): string | undefined {
    const node = this.store.getNode(path);
    if (!isDirectory(node)) return undefined;

    const lines = [path];
    this.renderChildren(node, SPACE_INDENT, lines);
    return lines.map((line) => `${line}\n`).join("");
  }

  private renderChildren(dir: DirectoryNode, prefix: string, lines: string[]): void {
    const entries = Array.from(dir.children);
    entries.forEach(([name, child], index) => {
      const last = index === entries.length - 1;
      lines.push(`${prefix}${last ? LAST_BRANCH : BRANCH}${name}`);
      if (child.kind === "directory") {
        this.renderChildren(child, prefix + (last ? SPACE_INDENT : PIPE_INDENT), lines);
      }
    });
  }
}

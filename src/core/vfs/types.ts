/**
 * VFS Type Definitions
 */

/**
 * Normalized absolute path: "/" or "/a/b". Never holds "." or ".." segments
 * produced by relative resolution, and never repeated separators.
 */
export type AbsolutePath = string;

export interface DirectoryNode {
  kind: "directory";
  /** Insertion order is the declared order of the source document. */
  children: Map<string, VfsNode>;
}

export interface FileNode {
  kind: "file";
  /** Raw stored value, possibly marker-prefixed base64. */
  content: string;
}

export type VfsNode = DirectoryNode | FileNode;

export interface FileStats {
  lines: number;
  words: number;
  bytes: number;
}

export interface WalkEntry {
  path: AbsolutePath;
  name: string;
  node: VfsNode;
}

export function isDirectory(node: VfsNode | undefined): node is DirectoryNode {
  return node?.kind === "directory";
}

export function isFile(node: VfsNode | undefined): node is FileNode {
  return node?.kind === "file";
}

/**
 * In-memory, read-only VFS for the shell session.
 *
 * The tree is built once and never changes; the current directory is the
 * only mutable state.
 */

import { EventBus } from "../eventBus";
import { NotADirectoryError, PathNotFoundError } from "../errors";
import { ROOT, resolvePath } from "./pathResolver";
import { VFSQueryEngine } from "./queryEngine";
import { TreeStore } from "./treeStore";
import { AbsolutePath, DirectoryNode, VfsNode } from "./types";

export * from "./types";
export { ROOT, resolvePath, splitPath, joinPath, childPath, displayName } from "./pathResolver";
export { CONTENT_MARKER, decodeContent, encodeContent, isEncoded as isEncodedContent } from "./contentCodec";
export { TreeStore } from "./treeStore";
export { VFSQueryEngine } from "./queryEngine";
export { loadVfs, parseVfsSource, createDefaultTree } from "./source";
export type { VfsLoadResult } from "./source";

export class VFS {
  readonly store: TreeStore;
  readonly query: VFSQueryEngine;
  private cwd: AbsolutePath = ROOT;

  constructor(root: DirectoryNode, private eventBus?: EventBus) {
    this.store = new TreeStore(root);
    this.query = new VFSQueryEngine(this.store);
  }

  get currentDirectory(): AbsolutePath {
    return this.cwd;
  }

  resolve(input: string): AbsolutePath {
    return resolvePath(this.cwd, input);
  }

  exists(path: AbsolutePath): boolean {
    return this.store.exists(path);
  }

  getNode(path: AbsolutePath): VfsNode | undefined {
    return this.store.getNode(path);
  }

  /**
   * Move to `input` (default: the root). Errors name `input` as typed.
   * @throws PathNotFoundError | NotADirectoryError
   */
  changeDirectory(input?: string): AbsolutePath {
    const target = input === undefined ? ROOT : this.resolve(input);
    const node = this.store.getNode(target);

    if (!node) throw new PathNotFoundError(input ?? target);
    if (node.kind !== "directory") throw new NotADirectoryError(input ?? target);

    if (target !== this.cwd) {
      const from = this.cwd;
      this.cwd = target;
      this.eventBus?.emit("CwdChangeEvent", { from, to: target });
    }
    return target;
  }
}

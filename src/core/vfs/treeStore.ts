import { ROOT, splitPath } from "./pathResolver";
import { AbsolutePath, DirectoryNode, VfsNode } from "./types";

/**
 * Read-only owner of the VFS tree. Lookup is an exact, case-sensitive walk
 * of `children` maps from the root.
 */
export class TreeStore {
  constructor(readonly root: DirectoryNode) {}

  exists(path: AbsolutePath): boolean {
    return this.getNode(path) !== undefined;
  }

  getNode(path: AbsolutePath): VfsNode | undefined {
    if (path === ROOT) return this.root;

    let current: VfsNode = this.root;
    for (const segment of splitPath(path)) {
      if (current.kind !== "directory") return undefined;
      const next = current.children.get(segment);
      if (!next) return undefined;
      current = next;
    }
    return current;
  }
}

/**
 * Path resolution for the in-memory VFS.
 *
 * Paths are plain strings with "/" separators. Resolution never touches the
 * tree: whether the result exists is a separate lookup.
 */

import { AbsolutePath } from "./types";

export const ROOT: AbsolutePath = "/";
const SEPARATOR = "/";

/**
 * Split a path into its non-empty segments ("//a///b" -> ["a", "b"])
 */
export function splitPath(path: string): string[] {
  return path.split(SEPARATOR).filter(Boolean);
}

export function joinPath(segments: readonly string[]): AbsolutePath {
  return SEPARATOR + segments.join(SEPARATOR);
}

export function childPath(parent: AbsolutePath, name: string): AbsolutePath {
  return parent === ROOT ? `${ROOT}${name}` : `${parent}${SEPARATOR}${name}`;
}

/**
 * Name shown for a directory in the prompt: "/" for the root, the last
 * segment otherwise.
 */
export function displayName(path: AbsolutePath): string {
  const segments = splitPath(path);
  return segments.length === 0 ? ROOT : segments[segments.length - 1];
}

/**
 * Resolve user input against the current directory.
 *
 * Absolute input is only stripped of empty segments. Relative input is
 * processed left to right: "." is skipped, ".." first drops a segment
 * appended by this call and only then one of `currentDir`'s segments, and
 * has no effect once both are exhausted.
 */
export function resolvePath(currentDir: AbsolutePath, input: string): AbsolutePath {
  if (input.startsWith(SEPARATOR)) {
    return joinPath(splitPath(input));
  }

  const base = splitPath(currentDir);
  const appended: string[] = [];

  for (const segment of splitPath(input)) {
    if (segment === ".") continue;
    if (segment === "..") {
      if (appended.length > 0) appended.pop();
      else if (base.length > 0) base.pop();
      continue;
    }
    appended.push(segment);
  }

  return joinPath([...base, ...appended]);
}

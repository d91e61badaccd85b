/**
 * Fixture builders shared by the test suites
 */

import { OutputSink } from "../src/core/types";
import { DirectoryNode, FileNode, VfsNode } from "../src/core/vfs";

export function file(content: string): FileNode {
  return { kind: "file", content };
}

export function dir(children: Record<string, VfsNode> = {}): DirectoryNode {
  return { kind: "directory", children: new Map(Object.entries(children)) };
}

export function captureSink(): OutputSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(line: string) {
      lines.push(line);
    },
  };
}

/**
 * /
 * ├── home/user/{documents/readme.txt, file1.txt, empty.txt}
 * ├── etc/motd            (base64)
 * └── a.txt
 */
export function sampleTree(): DirectoryNode {
  return dir({
    home: dir({
      user: dir({
        documents: dir({ "readme.txt": file("Welcome to the VFS!") }),
        "file1.txt": file("line one\nline two\n"),
        "empty.txt": file(""),
      }),
      other: dir(),
    }),
    etc: dir({ motd: file("base64:aMOpbGxvIHdvcmxk") }),
    "a.txt": file("hi there"),
  });
}

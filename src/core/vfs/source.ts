/**
 * Declarative VFS source documents.
 *
 * A document maps "/" to a directory node; every node carries a `type`
 * ("directory" | "file") and a `content` (child mapping or stored text).
 * The text is read into a syntax tree rather than plain objects, so child
 * order is the order written in the file.
 */

import fs from "fs";
import { Node as JsonNode, ParseError, getNodeValue, parseTree, printParseErrorCode } from "jsonc-parser";
import { z } from "zod";
import { EventBus } from "../eventBus";
import { VfsSourceError, errorMessage } from "../errors";
import { ShellLogger, createSilentLogger } from "../logger";
import { ROOT, childPath } from "./pathResolver";
import { AbsolutePath, DirectoryNode, VfsNode } from "./types";

const NodeTypeSchema = z.enum(["file", "directory"]);
const FileContentSchema = z.string().default("");

const DEFAULT_SOURCE = JSON.stringify({
  "/": {
    type: "directory",
    content: {
      home: {
        type: "directory",
        content: {
          user: {
            type: "directory",
            content: {
              documents: {
                type: "directory",
                content: {
                  "readme.txt": { type: "file", content: "Welcome to the VFS!" },
                },
              },
              "file1.txt": { type: "file", content: "Contents of file1.txt" },
            },
          },
        },
      },
    },
  },
});

function invalid(message: string, source?: string): VfsSourceError {
  return new VfsSourceError(`invalid VFS document: ${message}`, source);
}

/**
 * Object members in source order; `undefined` for anything but an object.
 * Integer-like and "__proto__" keys keep their place.
 */
function members(node: JsonNode): Array<[string, JsonNode]> | undefined {
  if (node.type !== "object") return undefined;

  const entries: Array<[string, JsonNode]> = [];
  for (const property of node.children ?? []) {
    const [key, value] = property.children ?? [];
    if (key && value && typeof key.value === "string") {
      entries.push([key.value, value]);
    }
  }
  return entries;
}

// A repeated key resolves to its last value, as with JSON.parse.
function member(entries: Array<[string, JsonNode]>, name: string): JsonNode | undefined {
  let found: JsonNode | undefined;
  for (const [key, value] of entries) {
    if (key === name) found = value;
  }
  return found;
}

function valueOf(node: JsonNode | undefined): unknown {
  return node === undefined ? undefined : getNodeValue(node);
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  where: string,
  source?: string
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw invalid(`${where}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`, source);
  }
  return parsed.data;
}

function buildNode(node: JsonNode, at: AbsolutePath, source?: string): VfsNode {
  const entries = members(node);
  if (!entries) throw invalid(`${at}: expected an object`, source);

  const type = validate(NodeTypeSchema, valueOf(member(entries, "type")), `${at}: type`, source);
  const content = member(entries, "content");

  if (type === "file") {
    return { kind: "file", content: validate(FileContentSchema, valueOf(content), `${at}: content`, source) };
  }
  return buildDirectory(content, at, source);
}

function buildDirectory(content: JsonNode | undefined, at: AbsolutePath, source?: string): DirectoryNode {
  const children = new Map<string, VfsNode>();
  if (content === undefined) return { kind: "directory", children };

  const entries = members(content);
  if (!entries) throw invalid(`${at}: content: expected an object`, source);

  for (const [name, child] of entries) {
    // a later duplicate replaces the value but keeps the first position
    children.set(name, buildNode(child, childPath(at, name), source));
  }
  return { kind: "directory", children };
}

/**
 * Parse JSON text into a node tree, keeping every directory's children in
 * the order the document declares them
 * @throws VfsSourceError
 */
export function parseVfsSource(text: string, source?: string): DirectoryNode {
  const errors: ParseError[] = [];
  const document = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false });

  if (errors.length > 0 || document === undefined) {
    const first = errors[0];
    const reason = first ? `${printParseErrorCode(first.error)} at offset ${first.offset}` : "empty document";
    throw new VfsSourceError(`invalid JSON: ${reason}`, source);
  }

  const entries = members(document);
  const rootNode = entries && member(entries, ROOT);
  if (!rootNode) throw invalid(`expected an object with a "${ROOT}" entry`, source);

  const root = buildNode(rootNode, ROOT, source);
  if (root.kind !== "directory") throw invalid(`${ROOT}: expected a directory`, source);
  return root;
}

export function createDefaultTree(): DirectoryNode {
  return parseVfsSource(DEFAULT_SOURCE, "default");
}

export interface VfsLoadResult {
  root: DirectoryNode;
  origin: "file" | "default";
  /** User-facing status lines, in order. */
  messages: string[];
}

export interface LoadVfsOptions {
  logger?: ShellLogger;
  eventBus?: EventBus;
}

/**
 * Load the tree from `vfsPath`, falling back to the default tree when no
 * path is given, the file is missing or the document is invalid.
 */
export function loadVfs(vfsPath: string | undefined, options: LoadVfsOptions = {}): VfsLoadResult {
  const logger = options.logger ?? createSilentLogger();
  const messages: string[] = [];

  const fallback = (reason?: string): VfsLoadResult => {
    messages.push("Using default VFS");
    options.eventBus?.emit("VfsLoadEvent", { origin: "default", source: vfsPath, reason });
    return { root: createDefaultTree(), origin: "default", messages };
  };

  if (!vfsPath) {
    return fallback();
  }

  if (!fs.existsSync(vfsPath)) {
    logger.warn("VFS source not found", { path: vfsPath });
    messages.push(`VFS file '${vfsPath}' not found`);
    return fallback("not found");
  }

  try {
    const root = parseVfsSource(fs.readFileSync(vfsPath, "utf8"), vfsPath);
    logger.info("VFS loaded", { path: vfsPath, entries: root.children.size });
    messages.push(`VFS loaded from ${vfsPath}`);
    options.eventBus?.emit("VfsLoadEvent", { origin: "file", source: vfsPath });
    return { root, origin: "file", messages };
  } catch (err) {
    logger.error(err instanceof Error ? err : errorMessage(err), { path: vfsPath });
    messages.push(`Failed to load VFS: ${errorMessage(err)}`);
    return fallback(errorMessage(err));
  }
}

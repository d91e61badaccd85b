/**
 * src/cli/commands/inspect.ts
 * vfs-shell inspect --vfs-path <file>
 */

import { Command } from "commander";
import { errorMessage } from "../../core/errors";
import { initializeLogger } from "../../core/logger";
import { ROOT, VFS, isEncodedContent, loadVfs } from "../../core/vfs";
import { printTable } from "../utils/printTable";
import { CliFlags, loadConfig, resolveSettings } from "../utils/loadConfig";

export const INSPECT_HEADERS = ["PATH", "TYPE", "BYTES", "LINES"];

/**
 * One row per node, root first, in declared depth-first order
 */
export function inspectRows(vfs: VFS): string[][] {
  const rows: string[][] = [[ROOT, "dir", String(vfs.query.directorySize(ROOT) ?? 0), "-"]];

  for (const entry of vfs.query.walk(ROOT)) {
    if (entry.node.kind === "directory") {
      rows.push([entry.path, "dir", String(vfs.query.directorySize(entry.path) ?? 0), "-"]);
      continue;
    }
    const stats = vfs.query.fileStats(entry.path);
    rows.push([
      entry.path,
      isEncodedContent(entry.node.content) ? "file (base64)" : "file",
      String(stats?.bytes ?? 0),
      String(stats?.lines ?? 0),
    ]);
  }

  return rows;
}

export function inspectCommand(): Command {
  const cmd = new Command("inspect");
  cmd
    .description("Print every node of a VFS document as a table")
    .option("--vfs-path <path>", "JSON document describing the VFS (default: built-in tree)")
    .option("--log-level <level>", "fatal|error|warn|info|debug|trace|silent")
    .action((opts: CliFlags) => {
      try {
        const settings = resolveSettings(opts, process.env, loadConfig());
        const logger = initializeLogger(undefined, { ...settings.logger, source: "inspect" });
        const loaded = loadVfs(settings.vfsPath, { logger });
        loaded.messages.forEach((message) => console.log(message));
        printTable(INSPECT_HEADERS, inspectRows(new VFS(loaded.root)));
      } catch (e) {
        console.error("Inspect failed:", errorMessage(e));
        process.exit(1);
      }
    });

  return cmd;
}

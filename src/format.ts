import { readFile, writeFile } from "node:fs/promises";
import { isEmptyBlock, locateImportBlock, normalizeBlock } from "./block.ts";
import { createComparator } from "./comparator.ts";
import { DEFAULT_GROUPS, STATUS_MESSAGES } from "./constants.ts";
import { rewriteLines } from "./rewriter.ts";
import type { FileResult, FormatOutcome, ImportBlock, ImportGroups, Line } from "./types.ts";

interface SplitContent {
  lines: string[];
  trailingNewline: boolean;
}

export function splitLines(content: string): SplitContent {
  if (content === "") return { lines: [], trailingNewline: false };
  const lines = content.split("\n");
  const trailingNewline = content.endsWith("\n");
  if (trailingNewline) lines.pop();
  return { lines, trailingNewline };
}

export function sortBlock(lines: readonly Line[], block: ImportBlock, groups: ImportGroups = DEFAULT_GROUPS): Line[] {
  const sorted = lines.slice(block.begin, block.end).sort(createComparator(groups));
  return [...lines.slice(0, block.begin), ...sorted, ...lines.slice(block.end)];
}

export function formatSource(content: string, groups: ImportGroups = DEFAULT_GROUPS): FormatOutcome {
  const { lines, trailingNewline } = splitLines(content);
  if (lines.length === 0) return { status: "read-failure" };

  const block = locateImportBlock(lines);
  if (isEmptyBlock(block)) return { status: "no-import-block" };

  const normalized = normalizeBlock(lines, block);
  const sorted = sortBlock(normalized, block, groups);
  const output = rewriteLines(sorted, block, groups).join("\n");

  return { status: "done", content: trailingNewline ? `${output}\n` : output };
}

async function read(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch {
    // An unreadable file is reported the same way as an empty one
    return "";
  }
}

export async function formatFile(
  filePath: string,
  options: { write: boolean; groups?: ImportGroups },
): Promise<FileResult> {
  const original = await read(filePath);
  const outcome = formatSource(original, options.groups);
  const message = STATUS_MESSAGES[outcome.status];
  if (outcome.status !== "done" || outcome.content === original) {
    return { path: filePath, status: outcome.status, message, changed: false };
  }

  if (options.write) {
    await writeFile(filePath, outcome.content, "utf-8");
  }
  return { path: filePath, status: outcome.status, message, changed: true };
}

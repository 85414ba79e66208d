import { withinBlock } from "./block.ts";
import { classify } from "./classifier.ts";
import { DEFAULT_GROUPS } from "./constants.ts";
import type { ImportBlock, ImportGroups, Line } from "./types.ts";

function needsSeparator(current: Line, next: Line, groups: ImportGroups): boolean {
  if (next.kind === "removed") return false;
  const currentKind = classify(current, groups);
  const nextKind = classify(next, groups);
  return currentKind !== "none" && nextKind !== "none" && currentKind !== nextKind;
}

/**
 * Emits the output lines for a sorted line list: removed lines are dropped and a
 * single blank line goes between neighbouring block lines of different groups.
 * Lines outside the block pass through untouched.
 */
export function rewriteLines(
  lines: readonly Line[],
  block: ImportBlock,
  groups: ImportGroups = DEFAULT_GROUPS,
): string[] {
  const output: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.kind === "removed") continue;
    output.push(line.text);

    const isLast = i === lines.length - 1;
    if (isLast || !withinBlock(i, block) || !withinBlock(i + 1, block)) continue;
    if (needsSeparator(line, lines[i + 1], groups)) output.push("");
  }

  return output;
}

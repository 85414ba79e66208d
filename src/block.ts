import { BLOCK_CLOSE, BLOCK_OPEN, LINE_COMMENT, isBlank, removeWhitespace } from "./constants.ts";
import type { ImportBlock, Line } from "./types.ts";

function delimiterText(line: string): string {
  const stripped = removeWhitespace(line);
  const comment = stripped.indexOf(LINE_COMMENT);
  return comment === -1 ? stripped : stripped.slice(0, comment);
}

/**
 * Finds the lines strictly between the first `import (` and the next `)`.
 *
 * Only the first block is considered. Parentheses nested inside the block, or inside
 * strings and comments, are not tracked: the first line that reads `)` closes it.
 * An empty range at the end of the input means there is no block.
 */
export function locateImportBlock(lines: readonly string[]): ImportBlock {
  const none: ImportBlock = { begin: lines.length, end: lines.length };

  const open = lines.findIndex((line) => delimiterText(line) === BLOCK_OPEN);
  if (open === -1) return none;

  const begin = open + 1;
  for (let end = begin; end < lines.length; end++) {
    if (delimiterText(lines[end]) === BLOCK_CLOSE) return { begin, end };
  }
  return none;
}

export function isEmptyBlock(block: ImportBlock): boolean {
  return block.begin >= block.end;
}

export function withinBlock(index: number, block: ImportBlock): boolean {
  return index >= block.begin && index < block.end;
}

export function normalizeBlock(lines: readonly string[], block: ImportBlock): Line[] {
  return lines.map((text, index): Line =>
    withinBlock(index, block) && isBlank(text) ? { kind: "removed" } : { kind: "kept", text },
  );
}

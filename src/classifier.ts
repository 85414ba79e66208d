import { DEFAULT_GROUPS, LINE_COMMENT, isBlank, removeWhitespace } from "./constants.ts";
import type { ImportGroups, Line, ModuleKind } from "./types.ts";

function hasQuotedPrefix(text: string, prefixes: string[]): boolean {
  return prefixes.some((prefix) => text.includes(`"${prefix}`));
}

/**
 * Maps a single line of an import block to its group. Third-party prefixes win over
 * platform prefixes; any other non-blank, non-comment content is treated as std-lib.
 */
export function classify(line: Line | string, groups: ImportGroups = DEFAULT_GROUPS): ModuleKind {
  if (typeof line !== "string" && line.kind === "removed") return "none";
  const text = typeof line === "string" ? line : line.text;

  if (hasQuotedPrefix(text, groups.thirdParty)) return "third-party";
  if (hasQuotedPrefix(text, groups.platform)) return "platform";
  if (isBlank(text)) return "none";
  if (removeWhitespace(text).startsWith(LINE_COMMENT)) return "none";
  return "std-lib";
}

import { classify } from "./classifier.ts";
import { DEFAULT_GROUPS, KIND_RANK, removeWhitespace } from "./constants.ts";
import type { ImportGroups, Line } from "./types.ts";

export function normalizedPath(text: string): string {
  const stripped = removeWhitespace(text);
  const quote = stripped.indexOf('"');
  return quote === -1 ? stripped : stripped.slice(quote);
}

export function compareLines(a: Line, b: Line, groups: ImportGroups = DEFAULT_GROUPS): number {
  if (a.kind === "removed" && b.kind === "removed") return 0;
  if (a.kind === "removed") return 1;
  if (b.kind === "removed") return -1;

  const rankDiff = KIND_RANK[classify(a, groups)] - KIND_RANK[classify(b, groups)];
  if (rankDiff !== 0) return rankDiff;

  const pathA = normalizedPath(a.text);
  const pathB = normalizedPath(b.text);
  if (pathA < pathB) return -1;
  if (pathA > pathB) return 1;
  return 0;
}

export function createComparator(groups: ImportGroups = DEFAULT_GROUPS): (a: Line, b: Line) => number {
  return (a, b) => compareLines(a, b, groups);
}

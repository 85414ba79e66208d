import type { FileStatus, ImportGroups, ModuleKind } from "./types.ts";

export const GO_EXT = ".go";
export const CONFIG_FILE = "import-groups.json";

export const DEFAULT_GROUPS: ImportGroups = {
  platform: ["platform/"],
  thirdParty: ["github.com/", "gopkg.in/", "golang.org/", "pault.ag/"],
};

export const KIND_RANK: Record<ModuleKind, number> = {
  "std-lib": 0,
  platform: 1,
  "third-party": 2,
  none: 3,
};

export const STATUS_MESSAGES: Record<FileStatus, string> = {
  "read-failure": "failed to read from file",
  "no-import-block": "no includes found",
  done: "done",
};

// C `isspace` class, narrower than `\s`
export const WHITESPACE_PATTERN = /[ \t\n\v\f\r]/g;
export const BLANK_PATTERN = /^[ \t\n\v\f\r]*$/;

export const LINE_COMMENT = "//";
export const BLOCK_OPEN = "import(";
export const BLOCK_CLOSE = ")";

export function removeWhitespace(text: string): string {
  return text.replace(WHITESPACE_PATTERN, "");
}

export function isBlank(text: string): boolean {
  return BLANK_PATTERN.test(text);
}

export type ModuleKind = "std-lib" | "platform" | "third-party" | "none";

export type Line = { kind: "kept"; text: string } | { kind: "removed" };

export interface ImportBlock {
  begin: number;
  end: number;
}

export interface ImportGroups {
  platform: string[];
  thirdParty: string[];
}

export type FormatOutcome =
  | { status: "read-failure" }
  | { status: "no-import-block" }
  | { status: "done"; content: string };

export type FileStatus = FormatOutcome["status"];

export interface FileResult {
  path: string;
  status: FileStatus;
  message: string;
  changed: boolean;
}

export interface Options {
  target: string;
  write: boolean;
  groups?: ImportGroups;
}

export interface Result {
  files: FileResult[];
  changed: string[];
}

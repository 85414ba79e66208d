import { dirname, extname, join } from "node:path";
import { stat } from "node:fs/promises";
import { glob } from "tinyglobby";
import { initConfig } from "./config.ts";
import { GO_EXT } from "./constants.ts";
import { UnexpectedError } from "./errors.ts";
import { formatFile } from "./format.ts";
import type { FileResult, Options, Result } from "./types.ts";

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export async function findGoFiles(target: string): Promise<{ files: string[]; configDir: string }> {
  if (await isDirectory(target)) {
    const matches = await glob(`**/*${GO_EXT}`, {
      cwd: target,
      onlyFiles: true,
      dot: true,
      expandDirectories: false,
    });
    return { files: matches.sort().map((file) => join(target, file)), configDir: target };
  }

  return { files: extname(target) === GO_EXT ? [target] : [], configDir: dirname(target) };
}

/**
 * Orders the import block of every `.go` file at or below `options.target`, one file at a time.
 * Per-file outcomes are reported in the result; anything thrown along the way is wrapped
 * in an `UnexpectedError`.
 */
export async function orderImports(options: Options): Promise<Result> {
  try {
    const { files, configDir } = await findGoFiles(options.target);
    const groups = options.groups ?? initConfig(configDir);

    const results: FileResult[] = [];
    for (const filePath of files) {
      results.push(await formatFile(filePath, { write: options.write, groups }));
    }

    return { files: results, changed: results.filter((r) => r.changed).map((r) => r.path) };
  } catch (error) {
    throw new UnexpectedError(error);
  }
}

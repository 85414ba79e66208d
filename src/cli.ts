import { parseArgs, styleText, type ParseArgsConfig } from "node:util";
import { orderImports } from "./main.ts";
import { toError, UnexpectedError } from "./errors.ts";

export const EXIT_OK = 0;
export const EXIT_CHANGES = 1;
export const EXIT_USAGE = -1;
export const EXIT_UNEXPECTED = -2;
export const EXIT_NO_FILES = -3;

export interface ParsedArgs {
  paths: string[];
  check: boolean;
  help: boolean;
}

const parseArgsConfig: ParseArgsConfig = {
  options: {
    check: { type: "boolean" },
    help: { type: "boolean", short: "h" },
  },
  allowPositionals: true,
  strict: true,
};

export function parseCliArgs(args: string[]): ParsedArgs {
  const { values, positionals } = parseArgs({
    ...parseArgsConfig,
    args,
  }) as {
    values: {
      check?: boolean;
      help?: boolean;
    };
    positionals: string[];
  };

  return {
    paths: positionals,
    check: values.check ?? false,
    help: values.help ?? false,
  };
}

export const USAGE = `
go-import-order sorts the import block of Go files
imports are divided into three groups: std-lib, platform and third-party
within each group they are sorted lexicographically

Usage: go-import-order [options] <file|directory>

Options:
      --check   Report files that would change without writing them; exit 1 if any would
  -h, --help    Show this help message

Prefixes for the platform and third-party groups are read from the nearest
import-groups.json, e.g. { "platform": ["platform/"], "thirdParty": ["github.com/"] }

Examples:
  go-import-order ../connection.go
  go-import-order ../memsql/
  go-import-order --check ./pkg
`;

export function printHelp(): void {
  console.error(USAGE);
}

export function formatResultLine(path: string, message: string): string {
  return `[${path}][${message}]`;
}

export async function run(argv: string[]): Promise<number> {
  let args: ParsedArgs;

  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${toError(error).message}`);
    printHelp();
    return EXIT_USAGE;
  }

  if (args.help) {
    printHelp();
    return EXIT_OK;
  }

  if (args.paths.length !== 1) {
    printHelp();
    return EXIT_USAGE;
  }

  const [target] = args.paths;

  try {
    const result = await orderImports({ target, write: !args.check });

    for (const { path, message } of result.files) {
      console.log(formatResultLine(path, message));
    }

    if (result.files.length === 0) {
      console.error(`${styleText("yellow", "⚠")} no go files to order imports`);
      return EXIT_NO_FILES;
    }

    if (args.check && result.changed.length > 0) {
      console.error(`\n${styleText("red", "✖")} Check failed: ${result.changed.length} file(s) would change.`);
      return EXIT_CHANGES;
    }
  } catch (error) {
    const err = error instanceof UnexpectedError ? error : new UnexpectedError(error);
    console.error(`${styleText("red", "✖")} ${err.message}`);
    return EXIT_UNEXPECTED;
  }

  return EXIT_OK;
}

export async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

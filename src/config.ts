import { dirname, join, resolve } from "node:path";
import { existsSync, readFileSync } from "node:fs";
import { CONFIG_FILE, DEFAULT_GROUPS } from "./constants.ts";
import { ConfigError } from "./errors.ts";
import type { ImportGroups } from "./types.ts";

export function findConfig(startDir: string): string | null {
  let dir = resolve(startDir);
  while (true) {
    const configPath = join(dir, CONFIG_FILE);
    if (existsSync(configPath)) return configPath;
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

function readPrefixes(config: Record<string, unknown>, key: keyof ImportGroups, configPath: string): string[] {
  const value = config[key];
  if (value === undefined) return DEFAULT_GROUPS[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string" && item !== "")) {
    throw new ConfigError(configPath, `"${key}" must be an array of non-empty strings`);
  }
  return value;
}

export function parseConfig(content: string, configPath: string): ImportGroups {
  let config: unknown;
  try {
    config = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(configPath, "not valid JSON", { cause: error });
  }

  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new ConfigError(configPath, "expected an object");
  }

  const record: Record<string, unknown> = { ...config };
  return {
    platform: readPrefixes(record, "platform", configPath),
    thirdParty: readPrefixes(record, "thirdParty", configPath),
  };
}

/** Loads the nearest `import-groups.json` at or above `startDir`, falling back to the built-in groups. */
export function initConfig(startDir: string): ImportGroups {
  const configPath = findConfig(startDir);
  if (!configPath) return DEFAULT_GROUPS;
  return parseConfig(readFileSync(configPath, "utf-8"), configPath);
}

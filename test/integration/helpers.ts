import type { TestContext } from "node:test";
import { join, resolve } from "node:path";
import { rm, cp, readFile, mkdtemp, writeFile, mkdir } from "node:fs/promises";
import { realpathSync } from "node:fs";
import { tmpdir } from "node:os";

export const fixturesDir = resolve(import.meta.dirname, "../../fixtures");

export async function createTempDir(t: TestContext, name = "go-import-order"): Promise<string> {
  const dir = realpathSync(await mkdtemp(join(tmpdir(), `${name}-`)));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

export async function copyFixture(t: TestContext, name: string): Promise<string> {
  const dir = await createTempDir(t, name);
  await cp(join(fixturesDir, name), dir, { recursive: true });
  return dir;
}

export async function writeFixtureFile(dir: string, file: string, content: string): Promise<string> {
  const filePath = join(dir, file);
  await mkdir(resolve(filePath, ".."), { recursive: true });
  await writeFile(filePath, content, "utf-8");
  return filePath;
}

export async function read(filePath: string): Promise<string> {
  return readFile(filePath, "utf-8");
}

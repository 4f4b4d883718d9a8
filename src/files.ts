import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { glob } from "tinyglobby";
import { z } from "zod";
import type { FmtguardConfig } from "./types.js";

const indexSchema = z.array(z.string().min(1));

export async function loadIndexFile(indexPath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(indexPath, "utf-8");
  } catch (err) {
    throw new Error(
      `Cannot read file list ${indexPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = indexSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    throw new Error(`${indexPath} must be a JSON array of file paths`);
  }
  return result.data;
}

/**
 * Files to check, relative to `cwd`: the explicit list when given, else the
 * `include` globs, else the entries of the index file.
 */
export async function resolveFiles(
  config: Pick<FmtguardConfig, "index" | "include" | "exclude">,
  cwd: string = process.cwd(),
  explicit: string[] = [],
): Promise<string[]> {
  if (explicit.length > 0) return explicit;

  if (config.include) {
    const files = await glob(config.include, {
      ignore: config.exclude ?? [],
      cwd,
    });
    return files.sort();
  }

  return loadIndexFile(join(cwd, config.index));
}

import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { CategoryPatterns } from "../ingest/category-matcher.js";

interface PatternTable {
  readonly extensions: readonly string[];
  readonly fileNames: readonly string[];
}

interface DefaultPatternData {
  readonly docs: PatternTable;
  readonly src: PatternTable;
}

let cached: Promise<CategoryPatterns> | null = null;

/**
 * Built-in category globs. Every extension contributes `**\/*.ext` and the
 * hidden-file form `**\/.*.ext`; file names match at the top level only.
 */
export async function loadDefaultPatterns(): Promise<CategoryPatterns> {
  cached ??= readDefaultPatterns();
  return await cached;
}

async function readDefaultPatterns(): Promise<CategoryPatterns> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const dataPath = path.resolve(moduleDir, "..", "..", "data", "default-patterns.json");
  const raw = await fs.readFile(dataPath, "utf8");
  const data = JSON.parse(raw) as DefaultPatternData;
  return {
    docs: expandTable(data.docs),
    src: expandTable(data.src),
  };
}

export function expandTable(table: PatternTable): string[] {
  return [
    ...table.extensions.flatMap((ext) => [`**/*.${ext}`, `**/.*.${ext}`]),
    ...table.fileNames,
  ];
}

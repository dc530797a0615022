import type { ConfigFile } from "./types.js";

const ROOT_KEYS = new Set(["scan", "category"]);
const CATEGORY_KEYS = new Set(["docs", "src"]);

/**
 * Validate parsed configuration. Unknown keys are errors so that a typo such
 * as `[categories]` is reported instead of silently falling back to defaults.
 */
export function validateConfigFile(input: unknown): ConfigFile {
  const errors: string[] = [];
  const parsed = parseConfigFile(input, errors);
  if (errors.length > 0) {
    throw new Error(errors.join("; "));
  }
  return parsed;
}

function parseConfigFile(input: unknown, errors: string[]): ConfigFile {
  if (input === null || input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push("configuration must be a table");
    return {};
  }
  assertNoExtraKeys(input, ROOT_KEYS, "configuration", errors);

  const scan =
    input.scan === undefined
      ? undefined
      : parseStringList(input.scan, "scan", errors);
  if (Array.isArray(input.scan) && input.scan.length === 0) {
    errors.push("scan must list at least one path");
  }

  if (input.category === undefined) {
    return { scan };
  }
  if (!isRecord(input.category)) {
    errors.push("category must be a table");
    return { scan };
  }
  assertNoExtraKeys(input.category, CATEGORY_KEYS, "category", errors);

  const docs =
    input.category.docs === undefined
      ? undefined
      : parseStringList(input.category.docs, "category.docs", errors);
  const src =
    input.category.src === undefined
      ? undefined
      : parseStringList(input.category.src, "category.src", errors);
  return { scan, category: { docs, src } };
}

function parseStringList(
  value: unknown,
  label: string,
  errors: string[],
): string[] {
  if (!Array.isArray(value)) {
    errors.push(`${label} must be an array of strings`);
    return [];
  }
  const items: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item !== "string") {
      errors.push(`${label}[${index}] must be a string`);
      return;
    }
    items.push(item);
  });
  return items;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  label: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${label} contains unsupported field '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

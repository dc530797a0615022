import fs from "node:fs/promises";
import path from "node:path";
import { describeError, errorCode } from "../logger.js";
import type { Logger } from "../logger.js";
import { GlobSyntaxError, IGNORE_GLOB, globToRegexSource } from "./glob.js";

export const DEFAULT_IGNORE_FILES = [".gitignore", ".ignore", ".kekignore"] as const;
const BUILTIN_IGNORE_PATTERNS = [".git/"] as const;

export interface IgnoreRule {
  readonly raw: string;
  readonly negated: boolean;
  readonly anchored: boolean;
  readonly directoryOnly: boolean;
  readonly regex: RegExp;
}

interface IgnoreFrame {
  /** Directory owning the rules, relative to the scan root ("" for the root). */
  readonly base: string;
  /** For rules from above the scan root: the path from their directory down to the root. */
  readonly prefix: string;
  readonly rules: readonly IgnoreRule[];
  readonly parent: IgnoreFrame | null;
}

/**
 * Directory-scoped ignore rules. Immutable: descending into a directory
 * yields a new set, so sibling subtrees never observe each other's rules.
 */
export class IgnoreSet {
  private constructor(private readonly top: IgnoreFrame | null) {}

  static empty(): IgnoreSet {
    return new IgnoreSet(null);
  }

  /** Set seeded with the rules every scan root carries, such as `.git/`. */
  static forRoot(): IgnoreSet {
    const rules: IgnoreRule[] = [];
    for (const pattern of BUILTIN_IGNORE_PATTERNS) {
      const rule = parseIgnoreRule(pattern);
      if (rule) {
        rules.push(rule);
      }
    }
    return IgnoreSet.empty().push("", rules);
  }

  push(base: string, rules: readonly IgnoreRule[]): IgnoreSet {
    if (rules.length === 0) {
      return this;
    }
    return new IgnoreSet({ base, prefix: "", rules, parent: this.top });
  }

  /** Push rules read from a directory above the scan root. */
  pushAncestor(prefix: string, rules: readonly IgnoreRule[]): IgnoreSet {
    if (rules.length === 0) {
      return this;
    }
    return new IgnoreSet({ base: "", prefix, rules, parent: this.top });
  }

  isExcluded(relativePath: string, isDirectory: boolean): boolean {
    const frames: IgnoreFrame[] = [];
    for (let frame = this.top; frame; frame = frame.parent) {
      frames.push(frame);
    }

    let excluded = false;
    for (let index = frames.length - 1; index >= 0; index -= 1) {
      const frame = frames[index];
      if (!frame) {
        continue;
      }
      const scoped = scopePath(relativePath, frame);
      if (scoped === null) {
        continue;
      }
      for (const rule of frame.rules) {
        if (rule.directoryOnly && !isDirectory) {
          continue;
        }
        if (matchesRule(scoped, rule)) {
          excluded = !rule.negated;
        }
      }
    }
    return excluded;
  }
}

/**
 * Starting set for a scan root: the built-in rules, then the ignore files of
 * every directory above the root, outermost first. The climb stops at the
 * directory holding `.git`, or at the filesystem root.
 */
export async function loadRootIgnoreSet(
  rootPath: string,
  ignoreFileNames: readonly string[],
  logger: Logger,
): Promise<IgnoreSet> {
  let ignoreSet = IgnoreSet.forRoot();
  if (await pathExists(path.join(rootPath, ".git"))) {
    return ignoreSet;
  }

  const ancestors: { prefix: string; rules: IgnoreRule[] }[] = [];
  let current = rootPath;
  let parent = path.dirname(current);
  while (parent !== current) {
    const prefix = path.relative(parent, rootPath).split(path.sep).join(path.posix.sep);
    ancestors.push({
      prefix,
      rules: await readIgnoreRules(parent, ignoreFileNames, logger, null),
    });
    if (await pathExists(path.join(parent, ".git"))) {
      break;
    }
    current = parent;
    parent = path.dirname(current);
  }

  for (const { prefix, rules } of ancestors.reverse()) {
    ignoreSet = ignoreSet.pushAncestor(prefix, rules);
  }
  return ignoreSet;
}

/**
 * Read the ignore files present in one directory and push their rules.
 * `presentNames` lists the entries of the directory so absent files cost no I/O.
 */
export async function descendInto(
  ignoreSet: IgnoreSet,
  absoluteDir: string,
  relativeDir: string,
  presentNames: ReadonlySet<string>,
  ignoreFileNames: readonly string[],
  logger: Logger,
): Promise<IgnoreSet> {
  const rules = await readIgnoreRules(absoluteDir, ignoreFileNames, logger, presentNames);
  return ignoreSet.push(relativeDir, rules);
}

/** With `presentNames` null, every candidate is tried and a missing file is not reported. */
async function readIgnoreRules(
  absoluteDir: string,
  ignoreFileNames: readonly string[],
  logger: Logger,
  presentNames: ReadonlySet<string> | null,
): Promise<IgnoreRule[]> {
  const rules: IgnoreRule[] = [];
  for (const fileName of ignoreFileNames) {
    if (presentNames && !presentNames.has(fileName)) {
      continue;
    }
    const filePath = path.join(absoluteDir, fileName);
    let contents: string;
    try {
      contents = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (!presentNames && errorCode(error) === "ENOENT") {
        continue;
      }
      logger.warn(`Unable to read ignore file ${filePath}: ${describeError(error)}`);
      continue;
    }
    rules.push(...parseIgnoreFile(contents, filePath, logger));
  }
  return rules;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR" || code === "EACCES") {
      return false;
    }
    throw error;
  }
}

export function parseIgnoreFile(
  contents: string,
  source: string,
  logger: Logger,
): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  const lines = contents.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    try {
      const rule = parseIgnoreRule(rawLine);
      if (rule) {
        rules.push(rule);
      }
    } catch (error) {
      if (!(error instanceof GlobSyntaxError)) {
        throw error;
      }
      logger.warn(`${source}:${index + 1}: skipping ignore rule: ${error.message}`);
    }
  });
  return rules;
}

/** Parse one gitignore line; `null` for blanks and comments. */
export function parseIgnoreRule(rawLine: string): IgnoreRule | null {
  const line = trimTrailingSpaces(rawLine);
  if (!line || line.startsWith("#")) {
    return null;
  }

  const negated = line.startsWith("!");
  let body = negated ? line.slice(1) : line;

  const directoryOnly = body.endsWith("/") && !body.endsWith("\\/");
  if (directoryOnly) {
    body = body.replace(/\/+$/, "");
  }
  const leadingSlash = body.startsWith("/");
  if (leadingSlash) {
    body = body.slice(1);
  }
  if (!body) {
    return null;
  }

  const anchored = leadingSlash || body.includes("/");
  const source = globToRegexSource(body, IGNORE_GLOB);
  return {
    raw: rawLine,
    negated,
    anchored,
    directoryOnly,
    regex: new RegExp(`^${source}$`),
  };
}

function trimTrailingSpaces(value: string): string {
  let end = value.length;
  while (end > 0 && value[end - 1] === " " && value[end - 2] !== "\\") {
    end -= 1;
  }
  return value.slice(0, end);
}

function scopePath(relativePath: string, frame: IgnoreFrame): string | null {
  if (frame.prefix) {
    return `${frame.prefix}/${relativePath}`;
  }
  if (!frame.base) {
    return relativePath;
  }
  if (!relativePath.startsWith(`${frame.base}/`)) {
    return null;
  }
  return relativePath.slice(frame.base.length + 1);
}

function matchesRule(scopedPath: string, rule: IgnoreRule): boolean {
  if (rule.anchored) {
    return rule.regex.test(scopedPath);
  }
  return rule.regex.test(path.posix.basename(scopedPath));
}

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describeError } from "../logger.js";
import { DEFAULT_IGNORE_FILES, descendInto, loadRootIgnoreSet } from "./ignore-set.js";
import type { IgnoreSet } from "./ignore-set.js";
import type { FileEntry, WalkOptions } from "./types.js";
import { drainWorkQueue } from "./work-queue.js";

interface DirectoryTask {
  readonly absolutePath: string;
  /** Relative to the scan root; "" for the root itself. */
  readonly relativePath: string;
  readonly ignoreSet: IgnoreSet;
}

interface WalkContext {
  readonly rootPath: string;
  readonly workingDir: string;
  readonly ignoreFileNames: readonly string[];
  readonly options: WalkOptions;
  readonly found: FileEntry[];
}

/**
 * Walk every scan root and return the non-excluded files, classified and
 * sorted by relative path. Roots are walked one after another; directories
 * within a root are read concurrently.
 */
export async function walkTrees(
  roots: readonly string[],
  options: WalkOptions,
): Promise<FileEntry[]> {
  const workingDir = await fs.realpath(
    path.resolve(options.workingDir ?? process.cwd()),
  );
  const seen = new Set<string>();
  const entries: FileEntry[] = [];

  for (const root of roots) {
    const rootPath = await resolveRoot(root, workingDir, options);
    if (!rootPath) {
      continue;
    }

    const found = await walkRoot(rootPath, workingDir, options);
    found.sort(compareEntries);
    for (const entry of found) {
      if (seen.has(entry.relativePath)) {
        continue;
      }
      seen.add(entry.relativePath);
      entries.push(entry);
    }
  }

  entries.sort(compareEntries);
  return entries;
}

async function walkRoot(
  rootPath: string,
  workingDir: string,
  options: WalkOptions,
): Promise<FileEntry[]> {
  const ignoreFileNames = options.ignoreFileNames ?? DEFAULT_IGNORE_FILES;
  const context: WalkContext = {
    rootPath,
    workingDir,
    ignoreFileNames,
    options,
    found: [],
  };
  const ignoreSet = await loadRootIgnoreSet(rootPath, ignoreFileNames, options.logger);

  await drainWorkQueue<DirectoryTask>(
    [{ absolutePath: rootPath, relativePath: "", ignoreSet }],
    options.concurrency ?? os.availableParallelism(),
    (task, enqueue) => visitDirectory(task, context, enqueue),
  );

  return context.found;
}

async function resolveRoot(
  root: string,
  workingDir: string,
  options: WalkOptions,
): Promise<string | null> {
  const absolute = path.resolve(workingDir, root);
  try {
    const stats = await fs.stat(absolute);
    if (!stats.isDirectory()) {
      options.logger.warn(`Scan path ${root} is not a directory. Skipping.`);
      return null;
    }
    return await fs.realpath(absolute);
  } catch (error) {
    options.logger.warn(
      `Scan path ${root} is not accessible: ${describeError(error)}. Skipping.`,
    );
    return null;
  }
}

async function visitDirectory(
  task: DirectoryTask,
  context: WalkContext,
  enqueue: (task: DirectoryTask) => void,
): Promise<void> {
  const { logger } = context.options;
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(task.absolutePath, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Unable to read directory ${task.absolutePath}: ${describeError(error)}`);
    return;
  }

  const ignoreSet = await descendInto(
    task.ignoreSet,
    task.absolutePath,
    task.relativePath,
    new Set(dirents.filter((dirent) => dirent.isFile()).map((dirent) => dirent.name)),
    context.ignoreFileNames,
    logger,
  );

  for (const dirent of dirents) {
    const absolutePath = path.join(task.absolutePath, dirent.name);
    const relativePath = task.relativePath
      ? `${task.relativePath}/${dirent.name}`
      : dirent.name;

    if (dirent.isDirectory()) {
      if (!ignoreSet.isExcluded(relativePath, true)) {
        enqueue({ absolutePath, relativePath, ignoreSet });
      }
      continue;
    }

    if (dirent.isSymbolicLink()) {
      if (await isLinkedFileInRoot(absolutePath, context)) {
        addFile(absolutePath, relativePath, ignoreSet, context);
      }
      continue;
    }

    if (dirent.isFile()) {
      addFile(absolutePath, relativePath, ignoreSet, context);
    }
  }
}

function addFile(
  absolutePath: string,
  rootRelativePath: string,
  ignoreSet: IgnoreSet,
  context: WalkContext,
): void {
  if (ignoreSet.isExcluded(rootRelativePath, false)) {
    return;
  }

  const relativePath = toRelativePosix(context.workingDir, absolutePath);
  context.found.push({
    relativePath,
    absolutePath,
    category: context.options.matcher.classify(relativePath),
  });
}

/** Directory links are never followed; file links must stay inside the root. */
async function isLinkedFileInRoot(
  linkPath: string,
  context: WalkContext,
): Promise<boolean> {
  try {
    const resolved = await fs.realpath(linkPath);
    if (!isWithinRoot(context.rootPath, resolved)) {
      return false;
    }
    const stats = await fs.stat(resolved);
    return stats.isFile();
  } catch (error) {
    context.options.logger.warn(
      `Skipping broken symbolic link ${linkPath}: ${describeError(error)}`,
    );
    return false;
  }
}

function toRelativePosix(basePath: string, absolutePath: string): string {
  const relative = path.relative(basePath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

function compareEntries(a: FileEntry, b: FileEntry): number {
  if (a.relativePath < b.relativePath) {
    return -1;
  }
  return a.relativePath > b.relativePath ? 1 : 0;
}

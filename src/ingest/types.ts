import type { Logger } from "../logger.js";
import type { CategoryMatcher } from "./category-matcher.js";

export const enum Category {
  Docs = "docs",
  Src = "src",
  Other = "other",
}

/** Output grouping order. */
export const CATEGORY_ORDER: readonly Category[] = [
  Category.Docs,
  Category.Src,
  Category.Other,
];

export interface FileEntry {
  /** Forward-slash path relative to the working directory. */
  readonly relativePath: string;
  readonly absolutePath: string;
  readonly category: Category;
}

export interface WalkOptions {
  readonly matcher: CategoryMatcher;
  readonly logger: Logger;
  /** Base for relative roots and for entry paths. Defaults to `process.cwd()`. */
  readonly workingDir?: string;
  readonly ignoreFileNames?: readonly string[];
  readonly concurrency?: number;
}

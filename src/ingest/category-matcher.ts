import path from "node:path";
import { ConfigError } from "../errors.js";
import { CATEGORY_GLOB, GlobSyntaxError, globToRegexSource } from "./glob.js";
import { Category } from "./types.js";

export interface CategoryPatterns {
  readonly docs: readonly string[];
  readonly src: readonly string[];
}

export class CategoryMatcher {
  private constructor(
    private readonly docs: readonly RegExp[],
    private readonly src: readonly RegExp[],
  ) {}

  /** Compile both pattern lists; any invalid glob is a `ConfigError`. */
  static compile(patterns: CategoryPatterns): CategoryMatcher {
    return new CategoryMatcher(
      compilePatterns(patterns.docs, Category.Docs),
      compilePatterns(patterns.src, Category.Src),
    );
  }

  classify(relativePath: string): Category {
    const normalized = normalizeForMatching(relativePath);
    if (this.docs.some((pattern) => pattern.test(normalized))) {
      return Category.Docs;
    }
    if (this.src.some((pattern) => pattern.test(normalized))) {
      return Category.Src;
    }
    return Category.Other;
  }
}

/**
 * Forward slashes, lowercase, and no leading `./` or `../` segments, so that
 * files under roots outside the working directory classify by their own path.
 */
export function normalizeForMatching(relativePath: string): string {
  const segments = relativePath.split(path.sep).join(path.posix.sep).split("/");
  let start = 0;
  while (segments[start] === "." || segments[start] === "..") {
    start += 1;
  }
  return segments.slice(start).join("/").toLowerCase();
}

function compilePatterns(
  globs: readonly string[],
  category: Category,
): RegExp[] {
  return globs.map((glob) => {
    try {
      const source = globToRegexSource(glob, CATEGORY_GLOB);
      return new RegExp(`^${source}$`, "i");
    } catch (error) {
      if (error instanceof GlobSyntaxError) {
        throw new ConfigError(
          `Invalid glob pattern in '${category}' -> "${glob}": ${error.message}`,
        );
      }
      throw error;
    }
  });
}

export interface GlobSyntax {
  /** `*` and `?` may consume `/`. */
  readonly crossSeparators: boolean;
  /** Wildcards may match a `.` that begins a path segment. */
  readonly matchDotSegments: boolean;
  /** `{a,b}` is alternation rather than literal text. */
  readonly alternation: boolean;
}

export const CATEGORY_GLOB: GlobSyntax = {
  crossSeparators: true,
  matchDotSegments: false,
  alternation: true,
};

export const IGNORE_GLOB: GlobSyntax = {
  crossSeparators: false,
  matchDotSegments: true,
  alternation: false,
};

export class GlobSyntaxError extends Error {
  constructor(
    readonly pattern: string,
    reason: string,
  ) {
    super(`${reason} in glob "${pattern}"`);
    this.name = "GlobSyntaxError";
  }
}

/**
 * Translate a glob into an unanchored regular expression source.
 * Callers wrap the result in `^...$`.
 */
export function globToRegexSource(pattern: string, syntax: GlobSyntax): string {
  if (!pattern) {
    throw new GlobSyntaxError(pattern, "Empty pattern");
  }

  const noDot = syntax.matchDotSegments ? "" : "(?!\\.)";
  const anyChar = anyCharSource(syntax);
  let regex = "";
  let segmentStart = true;
  let inAlternation = false;
  let alternationSegmentStart = false;

  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (char === undefined) {
      continue;
    }

    if (char === "*") {
      let run = 1;
      while (pattern[i + run] === "*") {
        run += 1;
      }
      const next = pattern[i + run];
      i += run - 1;

      if (run >= 2 && segmentStart && next === "/") {
        regex += `(?:${noDot}[^/]+/)*`;
        i += 1;
        continue;
      }

      if (run >= 2 && segmentStart && next === undefined) {
        regex += syntax.matchDotSegments ? ".*" : `${noDot}${anyChar}*`;
        segmentStart = false;
        continue;
      }

      regex += `${segmentStart ? noDot : ""}${anyChar}*`;
      segmentStart = false;
      continue;
    }

    if (char === "?") {
      regex += `${segmentStart ? noDot : ""}${anyChar}`;
      segmentStart = false;
      continue;
    }

    if (char === "[") {
      const parsed = parseCharacterClass(pattern, i);
      regex += `${segmentStart ? noDot : ""}${parsed.source}`;
      i = parsed.end;
      segmentStart = false;
      continue;
    }

    if (char === "\\") {
      const escaped = pattern[i + 1];
      if (escaped === undefined) {
        throw new GlobSyntaxError(pattern, "Dangling escape");
      }
      regex += escapeRegex(escaped);
      i += 1;
      segmentStart = escaped === "/";
      continue;
    }

    if (syntax.alternation && char === "{") {
      if (inAlternation) {
        throw new GlobSyntaxError(pattern, "Nested alternation");
      }
      inAlternation = true;
      alternationSegmentStart = segmentStart;
      regex += "(?:";
      continue;
    }

    if (syntax.alternation && char === "}") {
      if (!inAlternation) {
        throw new GlobSyntaxError(pattern, "Unopened alternation");
      }
      inAlternation = false;
      regex += ")";
      segmentStart = false;
      continue;
    }

    if (syntax.alternation && inAlternation && char === ",") {
      regex += "|";
      segmentStart = alternationSegmentStart;
      continue;
    }

    regex += escapeRegex(char);
    segmentStart = char === "/";
  }

  if (inAlternation) {
    throw new GlobSyntaxError(pattern, "Unclosed alternation");
  }

  return regex;
}

function anyCharSource(syntax: GlobSyntax): string {
  if (!syntax.crossSeparators) {
    return "[^/]";
  }
  return syntax.matchDotSegments ? "." : "(?:[^/]|/(?!\\.))";
}

interface ParsedClass {
  readonly source: string;
  readonly end: number;
}

function parseCharacterClass(pattern: string, start: number): ParsedClass {
  let i = start + 1;
  let negated = false;
  if (pattern[i] === "!" || pattern[i] === "^") {
    negated = true;
    i += 1;
  }

  const members: string[] = [];
  let first = true;
  while (i < pattern.length) {
    let char = pattern[i];
    if (char === undefined) {
      break;
    }
    if (char === "]" && !first) {
      const body = members.join("");
      return {
        source: negated ? `[^/${body}]` : `[${body}]`,
        end: i,
      };
    }
    first = false;

    if (char === "\\") {
      i += 1;
      char = pattern[i];
      if (char === undefined) {
        break;
      }
    }

    const rangeEnd = pattern[i + 2];
    if (pattern[i + 1] === "-" && rangeEnd !== undefined && rangeEnd !== "]") {
      if (rangeEnd < char) {
        throw new GlobSyntaxError(pattern, `Invalid range ${char}-${rangeEnd}`);
      }
      members.push(`${escapeClassChar(char)}-${escapeClassChar(rangeEnd)}`);
      i += 3;
      continue;
    }

    members.push(escapeClassChar(char));
    i += 1;
  }

  throw new GlobSyntaxError(pattern, "Unclosed character class");
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function escapeClassChar(value: string): string {
  return value.replace(/[\\\]\[^-]/g, "\\$&");
}

import type { SelectorSegment } from "./ast.ts";
import { SelectorSyntaxError } from "./diagnostics.ts";
import { parseSelector } from "./parser.ts";

const COMPILED_SELECTOR_CACHE = new Map<string, readonly SelectorSegment[]>();
const PLAIN_KEY_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$-]*$/;

function cloneSegments(segments: readonly SelectorSegment[]): SelectorSegment[] {
  return segments.map((segment) => ({ ...segment }));
}

/**
 * Compiles a textual selector such as `.users[].created_at` into structural
 * segments. Throws {@link SelectorSyntaxError} carrying every diagnostic
 * when the source does not parse.
 */
export function compileSelector(source: string): SelectorSegment[] {
  const cached = COMPILED_SELECTOR_CACHE.get(source);
  if (cached) {
    return cloneSegments(cached);
  }

  const result = parseSelector(source);
  if (result.ast === null || result.diagnostics.length > 0) {
    throw new SelectorSyntaxError(source, result.diagnostics);
  }

  COMPILED_SELECTOR_CACHE.set(source, cloneSegments(result.ast.segments));
  return cloneSegments(result.ast.segments);
}

export function formatSelector(segments: readonly SelectorSegment[]): string {
  if (segments.length === 0) {
    return ".";
  }

  return segments
    .map((segment) => {
      switch (segment.kind) {
        case "key":
          return PLAIN_KEY_PATTERN.test(segment.key) ? `.${segment.key}` : `[${JSON.stringify(segment.key)}]`;
        case "index":
          return `[${String(segment.index)}]`;
        case "each":
          return "[]";
        case "wildcard":
          return ".*";
        case "deep":
          return ".**";
      }
    })
    .join("");
}

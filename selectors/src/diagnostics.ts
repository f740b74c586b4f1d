import type { SourcePosition, SourceRange } from "./ast.ts";

export type DiagnosticCode =
  | "LEX_UNEXPECTED_CHARACTER"
  | "LEX_UNTERMINATED_STRING"
  | "LEX_INVALID_ESCAPE"
  | "LEX_INVALID_INDEX"
  | "PARSE_EMPTY_SELECTOR"
  | "PARSE_EXPECTED_TOKEN"
  | "PARSE_UNEXPECTED_TOKEN";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  range: SourceRange;
}

function clonePosition(position: SourcePosition): SourcePosition {
  return {
    offset: position.offset,
    line: position.line,
    column: position.column
  };
}

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  start: SourcePosition,
  end: SourcePosition
): Diagnostic {
  return {
    code,
    message,
    range: {
      start: clonePosition(start),
      end: clonePosition(end)
    }
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { line, column } = diagnostic.range.start;
  return `${diagnostic.code} at ${String(line)}:${String(column)}: ${diagnostic.message}`;
}

export class SelectorSyntaxError extends Error {
  readonly source: string;
  readonly diagnostics: Diagnostic[];

  constructor(source: string, diagnostics: Diagnostic[]) {
    const first = diagnostics[0];
    super(
      first
        ? `Invalid selector ${JSON.stringify(source)}: ${formatDiagnostic(first)}`
        : `Invalid selector ${JSON.stringify(source)}`
    );
    this.name = "SelectorSyntaxError";
    this.source = source;
    this.diagnostics = diagnostics;
  }
}

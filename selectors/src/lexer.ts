import type { SourcePosition, SourceRange } from "./ast.ts";
import { createDiagnostic, type Diagnostic, type DiagnosticCode } from "./diagnostics.ts";

export type TokenKind =
  | "Dot"
  | "Star"
  | "DoubleStar"
  | "LeftBracket"
  | "RightBracket"
  | "Identifier"
  | "Integer"
  | "StringLiteral"
  | "EOF";

export interface Token {
  kind: TokenKind;
  lexeme: string;
  value?: string;
  range: SourceRange;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

function createPosition(offset: number, line: number, column: number): SourcePosition {
  return { offset, line, column };
}

function isIdentifierStart(value: string): boolean {
  return /[A-Za-z_$]/.test(value);
}

function isIdentifierPart(value: string): boolean {
  return /[A-Za-z0-9_$-]/.test(value);
}

function isDigit(value: string): boolean {
  return value >= "0" && value <= "9";
}

function decodeEscape(value: string): string | null {
  switch (value) {
    case "\\":
      return "\\";
    case "\"":
      return "\"";
    case "'":
      return "'";
    case "n":
      return "\n";
    case "r":
      return "\r";
    case "t":
      return "\t";
    default:
      return null;
  }
}

export function lex(input: string): LexResult {
  const diagnostics: Diagnostic[] = [];
  const tokens: Token[] = [];
  const source = input;

  let index = 0;
  let line = 1;
  let column = 1;

  function currentPosition(): SourcePosition {
    return createPosition(index, line, column);
  }

  function currentChar(): string | undefined {
    return source[index];
  }

  function nextChar(): string | undefined {
    return source[index + 1];
  }

  function advance(): string {
    const value = source[index] ?? "";
    index += 1;
    if (value === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    return value;
  }

  function addToken(kind: TokenKind, start: SourcePosition, lexeme: string, value?: string): void {
    tokens.push({
      kind,
      lexeme,
      ...(value !== undefined ? { value } : {}),
      range: { start, end: currentPosition() }
    });
  }

  function addDiagnostic(code: DiagnosticCode, message: string, start: SourcePosition): void {
    diagnostics.push(createDiagnostic(code, message, start, currentPosition()));
  }

  while (index < source.length) {
    const value = currentChar();
    if (value === undefined) {
      break;
    }

    if (value === " " || value === "\t" || value === "\n" || value === "\r") {
      advance();
      continue;
    }

    const start = currentPosition();

    if (value === ".") {
      addToken("Dot", start, advance());
      continue;
    }

    if (value === "[") {
      addToken("LeftBracket", start, advance());
      continue;
    }

    if (value === "]") {
      addToken("RightBracket", start, advance());
      continue;
    }

    if (value === "*") {
      if (nextChar() === "*") {
        const lexeme = advance() + advance();
        addToken("DoubleStar", start, lexeme);
      } else {
        addToken("Star", start, advance());
      }
      continue;
    }

    if (value === "\"" || value === "'") {
      const quote = value;
      let lexeme = advance();
      let parsedValue = "";
      let terminated = false;

      while (index < source.length) {
        const char = currentChar();
        if (char === undefined) {
          break;
        }

        if (char === quote) {
          lexeme += advance();
          terminated = true;
          break;
        }

        if (char === "\\") {
          const escapeStart = currentPosition();
          lexeme += advance();
          const escaped = currentChar();
          if (escaped === undefined) {
            break;
          }

          lexeme += advance();
          const decoded = decodeEscape(escaped);
          if (decoded === null) {
            addDiagnostic("LEX_INVALID_ESCAPE", `Invalid string escape sequence "\\${escaped}"`, escapeStart);
          } else {
            parsedValue += decoded;
          }
          continue;
        }

        parsedValue += char;
        lexeme += advance();
      }

      if (!terminated) {
        addDiagnostic("LEX_UNTERMINATED_STRING", "Unterminated string literal", start);
      } else {
        addToken("StringLiteral", start, lexeme, parsedValue);
      }
      continue;
    }

    if (isDigit(value)) {
      let lexeme = "";
      while (index < source.length) {
        const digit = currentChar();
        if (digit === undefined || !isDigit(digit)) {
          break;
        }
        lexeme += advance();
      }

      if (!Number.isSafeInteger(Number(lexeme))) {
        addDiagnostic("LEX_INVALID_INDEX", `Sequence index ${lexeme} is out of range`, start);
      } else {
        addToken("Integer", start, lexeme, lexeme);
      }
      continue;
    }

    if (isIdentifierStart(value)) {
      let lexeme = "";
      while (index < source.length) {
        const part = currentChar();
        if (part === undefined || !isIdentifierPart(part)) {
          break;
        }
        lexeme += advance();
      }

      addToken("Identifier", start, lexeme, lexeme);
      continue;
    }

    const unexpected = advance();
    addDiagnostic("LEX_UNEXPECTED_CHARACTER", `Unexpected character "${unexpected}"`, start);
  }

  const eofPosition = currentPosition();
  tokens.push({
    kind: "EOF",
    lexeme: "",
    range: { start: eofPosition, end: eofPosition }
  });

  return {
    tokens,
    diagnostics
  };
}

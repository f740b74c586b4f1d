import type { SelectorAstNode, SelectorSegment, SourceRange } from "./ast.ts";
import { createDiagnostic, type Diagnostic, type DiagnosticCode } from "./diagnostics.ts";
import { lex, type Token, type TokenKind } from "./lexer.ts";

export interface ParseResult {
  ast: SelectorAstNode | null;
  diagnostics: Diagnostic[];
}

class Parser {
  private readonly tokens: Token[];
  private readonly diagnostics: Diagnostic[] = [];
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): ParseResult {
    const firstToken = this.current();
    if (firstToken.kind === "EOF") {
      this.addDiagnostic("PARSE_EMPTY_SELECTOR", "Selector must not be empty", firstToken);
      return { ast: null, diagnostics: this.diagnostics };
    }

    // A lone "." addresses the root value.
    if (firstToken.kind === "Dot" && this.peek(1).kind === "EOF") {
      this.advance();
      return {
        ast: {
          kind: "Selector",
          segments: [],
          range: this.rangeFrom(firstToken)
        },
        diagnostics: this.diagnostics
      };
    }

    const segments: SelectorSegment[] = [];
    while (!this.isAt("EOF")) {
      const segment = this.parseSegment();
      if (segment === null) {
        return { ast: null, diagnostics: this.diagnostics };
      }
      segments.push(segment);
    }

    return {
      ast: {
        kind: "Selector",
        segments,
        range: this.rangeFrom(firstToken)
      },
      diagnostics: this.diagnostics
    };
  }

  private parseSegment(): SelectorSegment | null {
    const token = this.current();

    if (token.kind === "Dot") {
      this.advance();
      return this.parseDotSegment();
    }

    if (token.kind === "LeftBracket") {
      this.advance();
      return this.parseBracketSegment();
    }

    this.addDiagnostic(
      "PARSE_UNEXPECTED_TOKEN",
      `Unexpected ${describeToken(token)}; expected "." or "["`,
      token
    );
    return null;
  }

  private parseDotSegment(): SelectorSegment | null {
    const token = this.current();

    if (token.kind === "Identifier" && token.value !== undefined) {
      this.advance();
      return { kind: "key", key: token.value };
    }

    if (token.kind === "Star") {
      this.advance();
      return { kind: "wildcard" };
    }

    if (token.kind === "DoubleStar") {
      this.advance();
      return { kind: "deep" };
    }

    this.addDiagnostic(
      "PARSE_EXPECTED_TOKEN",
      `Expected a key name, "*" or "**" after "." but found ${describeToken(token)}`,
      token
    );
    return null;
  }

  private parseBracketSegment(): SelectorSegment | null {
    const token = this.current();
    let segment: SelectorSegment;

    if (token.kind === "RightBracket") {
      this.advance();
      return { kind: "each" };
    }

    if (token.kind === "Integer" && token.value !== undefined) {
      segment = { kind: "index", index: Number(token.value) };
    } else if (token.kind === "StringLiteral" && token.value !== undefined) {
      segment = { kind: "key", key: token.value };
    } else if (token.kind === "Star") {
      segment = { kind: "wildcard" };
    } else {
      this.addDiagnostic(
        "PARSE_EXPECTED_TOKEN",
        `Expected an index, a quoted key, "*" or "]" after "[" but found ${describeToken(token)}`,
        token
      );
      return null;
    }

    this.advance();
    if (this.expect("RightBracket", `Expected "]" to close the bracket segment`) === null) {
      return null;
    }

    return segment;
  }

  private expect(kind: TokenKind, message: string): Token | null {
    const token = this.current();
    if (token.kind === kind) {
      return this.advance();
    }

    this.addDiagnostic("PARSE_EXPECTED_TOKEN", `${message} but found ${describeToken(token)}`, token);
    return null;
  }

  private rangeFrom(startToken: Token): SourceRange {
    const lastConsumed = this.tokens[Math.max(this.index - 1, 0)] ?? startToken;
    return {
      start: { ...startToken.range.start },
      end: { ...lastConsumed.range.end }
    };
  }

  private isAt(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private peek(distance: number): Token {
    return this.tokens[this.index + distance] ?? this.eof();
  }

  private current(): Token {
    return this.tokens[this.index] ?? this.eof();
  }

  private eof(): Token {
    const last = this.tokens[this.tokens.length - 1];
    if (last === undefined) {
      const origin = { offset: 0, line: 1, column: 1 };
      return { kind: "EOF", lexeme: "", range: { start: origin, end: origin } };
    }
    return last;
  }

  private advance(): Token {
    const token = this.current();
    if (this.index < this.tokens.length - 1) {
      this.index += 1;
    }
    return token;
  }

  private addDiagnostic(code: DiagnosticCode, message: string, token: Token): void {
    this.diagnostics.push(createDiagnostic(code, message, token.range.start, token.range.end));
  }
}

function describeToken(token: Token): string {
  if (token.kind === "EOF") {
    return "end of selector";
  }

  return `"${token.lexeme}"`;
}

export function parseSelector(input: string): ParseResult {
  const lexResult = lex(input);
  if (lexResult.diagnostics.length > 0) {
    return {
      ast: null,
      diagnostics: lexResult.diagnostics
    };
  }

  const parser = new Parser(lexResult.tokens);
  return parser.parse();
}

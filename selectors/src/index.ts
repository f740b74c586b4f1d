export { compileSelector, formatSelector } from "./compile.ts";
export { SelectorSyntaxError, formatDiagnostic } from "./diagnostics.ts";
export { lex } from "./lexer.ts";
export { parseSelector } from "./parser.ts";
export type {
  DeepWildcardSegment,
  EachSegment,
  IndexSegment,
  KeySegment,
  SelectorAstNode,
  SelectorSegment,
  SourcePosition,
  SourceRange,
  WildcardSegment
} from "./ast.ts";
export type { Diagnostic, DiagnosticCode } from "./diagnostics.ts";
export type { LexResult, Token, TokenKind } from "./lexer.ts";
export type { ParseResult } from "./parser.ts";

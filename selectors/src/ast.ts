export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export interface SourceRange {
  start: SourcePosition;
  end: SourcePosition;
}

export interface KeySegment {
  kind: "key";
  key: string;
}

export interface IndexSegment {
  kind: "index";
  index: number;
}

/** Every element of a sequence (`[]`). */
export interface EachSegment {
  kind: "each";
}

/** Every key of a mapping or every index of a sequence (`.*` / `[*]`). */
export interface WildcardSegment {
  kind: "wildcard";
}

/** The current location and every location below it (`.**`). */
export interface DeepWildcardSegment {
  kind: "deep";
}

export type SelectorSegment =
  | KeySegment
  | IndexSegment
  | EachSegment
  | WildcardSegment
  | DeepWildcardSegment;

export interface SelectorAstNode {
  kind: "Selector";
  segments: SelectorSegment[];
  range: SourceRange;
}

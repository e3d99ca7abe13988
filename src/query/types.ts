/**
 * Query types
 *
 * Patterns are parsed into a small AST, then compiled into a flat list of
 * steps per pattern that the query cursor interprets.
 */

import type { SyntaxNode } from "../tree/node.js";

export type Quantifier = "?" | "*" | "+";

/** What a single node step accepts */
export interface NodeMatcher {
  /** Accepted symbol ids; null accepts any node */
  symbols: ReadonlySet<number> | null;
  /** `(_)` accepts only named nodes */
  namedOnly: boolean;
  /** `(MISSING ...)` accepts only missing nodes */
  missing: boolean;
}

export interface NodePattern {
  type: "node";
  offset: number;
  matcher: NodeMatcher;
  children: PatternElement[];
  negatedFields: number[];
}

/** `((a) (b))`: a sequence of siblings */
export interface GroupPattern {
  type: "group";
  offset: number;
  children: PatternElement[];
}

export interface AlternationPattern {
  type: "alternation";
  offset: number;
  alternatives: PatternItem[];
}

export type Pattern = NodePattern | GroupPattern | AlternationPattern;

export interface PatternItem {
  pattern: Pattern;
  offset: number;
  field: number | null;
  quantifier: Quantifier | null;
  captures: number[];
}

export type PatternElement =
  | { type: "item"; item: PatternItem }
  | { type: "anchor"; offset: number };

export type PredicateArgument =
  | { type: "capture"; name: string; id: number }
  | { type: "string"; value: string };

export interface QueryPredicate {
  operator: string;
  args: PredicateArgument[];
}

export interface LocatedPredicate {
  predicate: QueryPredicate;
  offset: number;
}

export interface ParsedPattern {
  /** A top-level group matches a sequence of siblings */
  item: PatternItem;
  predicates: LocatedPredicate[];
  /** Offset of the pattern in the query source, in UTF-16 units */
  offset: number;
}

export type Step =
  | {
      op: "match";
      /** Depth below the node the pattern starts at */
      depth: number;
      matcher: NodeMatcher;
      field: number | null;
      negatedFields: readonly number[];
      captures: readonly number[];
      /** No named sibling may come between this node and the previous step's */
      immediate: boolean;
      /** The node must be the last named child of its parent */
      lastChild: boolean;
    }
  | { op: "split"; targets: [number, number] }
  | { op: "jump"; target: number }
  | { op: "done" };

export interface QueryCapture {
  name: string;
  /** Index into `query.captureNames` */
  captureId: number;
  node: SyntaxNode;
  patternIndex: number;
}

export type Properties = Readonly<Record<string, string | null>>;

export interface PropertySetting {
  key: string;
  value: string | null;
}

export interface QueryMatch {
  patternIndex: number;
  captures: QueryCapture[];
  captureMap: Map<string, SyntaxNode[]>;
  setProperties: Properties;
}

/** Returns the source text of a node */
export type TextProvider = (node: SyntaxNode) => string;

export interface QueryCursorOptions {
  /** Only report matches intersecting [startIndex, endIndex), in bytes */
  startIndex?: number;
  endIndex?: number;
  /** Node text for predicates; defaults to the tree's own text */
  textProvider?: TextProvider;
}

/** A compiled text predicate */
export type MatchPredicate = (match: QueryMatch, textOf: TextProvider) => boolean;

/**
 * Builds a predicate from its arguments when the query is compiled. Throw
 * to reject the arguments; the message becomes a predicate error.
 */
export type PredicateFactory = (args: readonly PredicateArgument[]) => MatchPredicate;

export interface QueryOptions {
  /** Extra `#name?` predicates, taking precedence over the built-in ones */
  predicates?: Record<string, PredicateFactory>;
}

export interface CaptureOffset {
  /** Bytes added to the start of the captured range */
  start: number;
  /** Bytes added to the end of the captured range */
  end: number;
}

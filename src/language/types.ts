/**
 * Shape of a compiled grammar table blob.
 *
 * Blobs are produced by a grammar compiler outside this project and loaded
 * with `loadLanguage`. Symbol ids are indices into `symbols`; field ids are
 * indices into `fields`.
 */

export interface SymbolEntry {
  /** Node kind name, e.g. "identifier" or "(" */
  name: string;
  /** Named nodes are written as (kind) in queries, anonymous ones as "kind" */
  named?: boolean;
  /** Hidden nodes are flattened into their parent */
  visible?: boolean;
}

export interface ProductionEntry {
  lhs: number;
  length: number;
  /** Field assignments by child slot (extras do not occupy slots) */
  fields?: Array<{ field: number; slot: number }>;
}

export type ActionEntry = ["shift", number] | ["reduce", number] | ["accept"];

export interface ParseStateEntry {
  /** Lexical state used to read the lookahead in this parse state */
  lex: number;
  /** Index into `externalStates`; 0 or absent means no external tokens */
  external?: number;
  /** Keyed by terminal symbol id */
  actions: Record<string, ActionEntry>;
  /** Keyed by nonterminal symbol id */
  gotos?: Record<string, number>;
}

/** [lo, hi, next, skip] over inclusive code point ranges */
export type LexTransitionEntry =
  | [number, number, number]
  | [number, number, number, boolean];

export interface LexStateEntry {
  accept?: number;
  transitions: LexTransitionEntry[];
}

export interface LanguageBlob {
  version: number;
  name: string;
  tokenCount: number;
  symbols: SymbolEntry[];
  fields?: string[];
  extras?: number[];
  productions: ProductionEntry[];
  states: ParseStateEntry[];
  lexStates: LexStateEntry[];
  errorLexState?: number;
  externalTokens?: number[];
  externalStates?: number[][];
}

export type ParseAction =
  | { type: "shift"; state: number }
  | { type: "reduce"; production: number }
  | { type: "accept" };

export interface LexTransition {
  lo: number;
  hi: number;
  next: number;
  skip: boolean;
}

export interface LexState {
  /** Accepted symbol, or -1 */
  accept: number;
  transitions: LexTransition[];
}

export interface LexMode {
  lexState: number;
  externalState: number;
}

/**
 * The lexer surface an external scanner is given.
 */
export interface ScannerLexer {
  /** Current code point, or -1 at end of input */
  readonly lookaheadChar: number;
  resultSymbol: number;
  advance(skip?: boolean): void;
  markEnd(): void;
  lookahead(k?: number): number;
  eof(): boolean;
  getColumn(): number;
}

/**
 * Recognizes tokens that depend on context (delimited strings, heredocs,
 * indentation). Called before the DFA when the parse state allows external
 * tokens. Returns true after setting `resultSymbol` and calling `markEnd`.
 */
export interface ExternalScanner {
  scan(lexer: ScannerLexer, validSymbols: ReadonlySet<number>): boolean;
}

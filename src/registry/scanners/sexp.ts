import type { ExternalScanner, ScannerLexer } from "../../language/types.js";

/** Symbol id of `string` in grammars/sexp/grammar.json */
export const SEXP_STRING = 3;

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

function isSpace(c: number): boolean {
  return c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;
}

/**
 * Double-quoted strings with backslash escapes. An unterminated string is
 * rejected so the opening quote falls through to the DFA as an error.
 */
export const sexpScanner: ExternalScanner = {
  scan(lexer: ScannerLexer, validSymbols: ReadonlySet<number>): boolean {
    if (!validSymbols.has(SEXP_STRING)) return false;
    while (isSpace(lexer.lookaheadChar)) lexer.advance(true);
    if (lexer.lookaheadChar !== QUOTE) return false;
    lexer.advance();
    for (;;) {
      const c: number = lexer.lookaheadChar;
      if (c < 0) return false;
      lexer.advance();
      if (c === BACKSLASH) {
        if (lexer.eof()) return false;
        lexer.advance();
      } else if (c === QUOTE) {
        lexer.markEnd();
        lexer.resultSymbol = SEXP_STRING;
        return true;
      }
    }
  },
};

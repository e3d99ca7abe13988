/**
 * DFA-driven lexer.
 *
 * Reads one token at a time in a lex mode chosen by the parser. The
 * external scanner, when the mode allows external tokens, gets the first
 * chance at the input. Tracks the furthest byte examined so that the
 * parser can record how far past a token its recognition depended on.
 */

import { END_SYMBOL, ERROR_SYMBOL, type Language } from "../language/language.js";
import type { LexMode, LexState, LexTransition, ScannerLexer } from "../language/types.js";
import { lengthSub, ZERO_LENGTH, type Length, type Point } from "../tree/length.js";
import type { DecodedChar, InputReader } from "./input.js";

export interface Token {
  symbol: number;
  padding: Length;
  size: Length;
  /** Bytes examined past the end of the token */
  lookaheadBytes: number;
  lexMode: LexMode;
}

export class Lexer implements ScannerLexer {
  resultSymbol = -1;
  /** Total advances; the parser polls this for cancellation */
  advanceCount = 0;

  private position: Length = ZERO_LENGTH;
  private tokenStart: Length = ZERO_LENGTH;
  private tokenEnd: Length = ZERO_LENGTH;
  private examinedEnd = 0;
  private endMarked = false;
  private char: DecodedChar | null = null;

  constructor(readonly input: InputReader) {}

  get currentPosition(): Length {
    return this.position;
  }

  /** Current code point, or -1 at end of input */
  get lookaheadChar(): number {
    return this.current().codePoint;
  }

  private current(): DecodedChar {
    if (!this.char) this.char = this.read(this.position.bytes);
    return this.char;
  }

  private read(offset: number): DecodedChar {
    const decoded = this.input.decode(offset);
    this.examinedEnd = Math.max(this.examinedEnd, offset + Math.max(1, decoded.byteLength));
    return decoded;
  }

  /**
   * Consume the current code point. With `skip`, the consumed text becomes
   * padding before the token instead of part of it.
   */
  advance(skip = false): void {
    const char = this.current();
    if (char.codePoint < 0) return;
    this.advanceCount++;
    const { bytes, row, column } = this.position;
    this.position =
      char.codePoint === 0x0a
        ? { bytes: bytes + char.byteLength, row: row + 1, column: 0 }
        : { bytes: bytes + char.byteLength, row, column: column + char.utf16Length };
    this.char = null;
    if (skip) this.tokenStart = this.position;
  }

  /** The token ends at the current position unless marked again later */
  markEnd(): void {
    this.endMarked = true;
    this.tokenEnd = this.position;
  }

  /** Code point `k` positions ahead of the current one, or -1 */
  lookahead(k = 0): number {
    let offset = this.position.bytes;
    let char = this.current();
    for (let i = 0; i < k; i++) {
      if (char.codePoint < 0) return -1;
      offset += char.byteLength;
      char = this.read(offset);
    }
    return char.codePoint;
  }

  eof(): boolean {
    return this.lookaheadChar < 0;
  }

  getColumn(): number {
    return this.position.column;
  }

  resetTo(byteOffset: number, point: Point): void {
    this.position = { bytes: byteOffset, row: point.row, column: point.column };
    this.tokenStart = this.position;
    this.tokenEnd = this.position;
    this.char = null;
  }

  /**
   * Read the next token in `mode`. The lexer is left positioned at the end
   * of the returned token. Input that no state accepts becomes an ERROR
   * token covering a single code point, so lexing always makes progress.
   */
  lex(language: Language, mode: LexMode): Token {
    const start = this.position;
    this.tokenStart = start;
    this.tokenEnd = start;
    this.examinedEnd = start.bytes;
    this.resultSymbol = -1;
    this.endMarked = false;

    const scanner = language.externalScanner;
    const validExternal = language.externalValidSymbols(mode.externalState);
    if (scanner && validExternal.size > 0) {
      if (scanner.scan(this, validExternal) && this.resultSymbol >= 0) {
        if (!this.endMarked) this.markEnd();
        return this.finish(start, this.resultSymbol, mode);
      }
      this.rewind(start);
    }

    const lexState = mode.lexState < 0 ? language.errorLexState : mode.lexState;
    let state = language.lexState(lexState);
    let accepted = -1;
    while (state) {
      if (state.accept >= 0) {
        accepted = state.accept;
        this.markEnd();
      }
      if (state.transitions.length === 0) break;
      const codePoint = this.lookaheadChar;
      if (codePoint < 0) break;
      const transition = findTransition(state, codePoint);
      if (!transition) break;
      if (transition.skip) {
        accepted = -1;
        this.advance(true);
        this.tokenEnd = this.position;
      } else {
        this.advance(false);
      }
      state = language.lexState(transition.next);
    }

    if (accepted >= 0) return this.finish(start, accepted, mode);

    // Nothing accepted: either end of input or an unrecognized character.
    this.rewind(this.tokenStart);
    if (this.eof()) {
      this.markEnd();
      return this.finish(start, END_SYMBOL, mode);
    }
    this.advance(false);
    this.markEnd();
    return this.finish(start, ERROR_SYMBOL, mode);
  }

  private rewind(to: Length): void {
    this.position = to;
    this.tokenStart = to;
    this.tokenEnd = to;
    this.char = null;
  }

  private finish(start: Length, symbol: number, mode: LexMode): Token {
    const end = this.tokenEnd;
    const tokenStart = this.tokenStart.bytes <= end.bytes ? this.tokenStart : end;
    this.position = end;
    this.char = null;
    return {
      symbol,
      padding: lengthSub(tokenStart, start),
      size: lengthSub(end, tokenStart),
      lookaheadBytes: Math.max(0, this.examinedEnd - end.bytes),
      lexMode: mode,
    };
  }
}

function findTransition(state: LexState, codePoint: number): LexTransition | null {
  const transitions = state.transitions;
  let low = 0;
  let high = transitions.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const t = transitions[mid];
    if (!t) break;
    if (codePoint < t.lo) high = mid - 1;
    else if (codePoint > t.hi) low = mid + 1;
    else return t;
  }
  return null;
}

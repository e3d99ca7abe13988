/**
 * LR parser with error recovery and incremental reuse.
 *
 * A Parser is bound to one Language at a time. Each call to `parse` runs a
 * fresh ParseRun; nothing from an interrupted parse survives it, so a
 * cancelled parse never leaks a partial tree.
 */

import { DEFAULT_CONFIG } from "../config.js";
import { InvalidLanguageError, ParseCancelledError, ReleasedHandleError } from "../errors.js";
import { END_SYMBOL, ERROR_SYMBOL, type Language } from "../language/language.js";
import type { LexMode } from "../language/types.js";
import { InputReader, type ParseInput } from "../lexer/input.js";
import { Lexer } from "../lexer/lexer.js";
import type { Edit } from "../tree/edit.js";
import { lengthAdd, lengthToPoint, ZERO_LENGTH, type Length } from "../tree/length.js";
import { createLeaf, createNode, type Subtree } from "../tree/subtree.js";
import { Tree } from "../tree/tree.js";
import type { ParseLogger } from "./logger.js";
import { findRecovery, type RecoveryCandidate } from "./recovery.js";
import { isReusable, ReusableNodes, sameLexMode } from "./reusable.js";
import { ParseStack } from "./stack.js";

export interface ParserOptions {
  /** Tokens error recovery may skip; default 8 */
  recoveryLookahead?: number;
  /** Tokens a recovery must accept before it is chosen; default 2 */
  recoveryConfirmTokens?: number;
  /** Operations between cancellation checks; default 100 */
  cancellationCheckInterval?: number;
}

export interface ParseOptions {
  /** Edits to apply to `oldTree` before reusing it, in order */
  edits?: readonly Edit[];
  signal?: AbortSignal;
  timeoutMs?: number;
  logger?: ParseLogger;
}

interface RunSettings {
  recoveryLookahead: number;
  recoveryConfirmTokens: number;
  cancellationCheckInterval: number;
  signal: AbortSignal | null;
  deadline: number | null;
  logger: ParseLogger | null;
}

export class Parser {
  private language: Language | null = null;
  private logger: ParseLogger | null = null;
  private timeoutMs = 0;
  private released = false;
  private readonly settings: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    const defaults = DEFAULT_CONFIG.parser;
    this.settings = {
      recoveryLookahead: Math.max(1, options.recoveryLookahead ?? defaults.recoveryLookahead),
      recoveryConfirmTokens: Math.max(1, options.recoveryConfirmTokens ?? defaults.recoveryConfirmTokens),
      cancellationCheckInterval: Math.max(
        1,
        options.cancellationCheckInterval ?? defaults.cancellationCheckInterval
      ),
    };
    this.timeoutMs = defaults.timeoutMs;
  }

  private assertAlive(): void {
    if (this.released) throw new ReleasedHandleError("Parser");
  }

  setLanguage(language: Language): this {
    this.assertAlive();
    language.assertAlive();
    this.language = language;
    return this;
  }

  getLanguage(): Language | null {
    return this.language;
  }

  /** Logger used when `parse` is not given one */
  setLogger(logger: ParseLogger | null): this {
    this.logger = logger;
    return this;
  }

  /** Timeout used when `parse` is not given one; 0 disables it */
  setTimeoutMs(timeoutMs: number): this {
    this.timeoutMs = Math.max(0, timeoutMs);
    return this;
  }

  /**
   * Drop the language, logger and timeout so the parser can be configured
   * from scratch.
   */
  reset(): void {
    this.assertAlive();
    this.language = null;
    this.logger = null;
    this.timeoutMs = DEFAULT_CONFIG.parser.timeoutMs;
  }

  delete(): void {
    this.released = true;
    this.language = null;
  }

  /**
   * Parse `input` into a Tree.
   *
   * With `oldTree`, subtrees of that tree untouched by its edits are reused.
   * `options.edits` are applied to `oldTree` first; an oldTree built from a
   * different Language is ignored.
   *
   * @throws ParseCancelledError when the signal aborts or the timeout expires
   */
  parse(input: ParseInput, oldTree?: Tree | null, options: ParseOptions = {}): Tree {
    this.assertAlive();
    const language = this.language;
    if (!language) throw new Error("Parser has no language; call setLanguage() first");
    language.assertAlive();

    let previous = oldTree ?? null;
    if (previous) {
      previous.assertAlive();
      for (const edit of options.edits ?? []) previous = previous.edit(edit);
      if (previous.language !== language) previous = null;
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const reader = new InputReader(input);
    const run = new ParseRun(language, reader, previous ? previous.root : null, {
      ...this.settings,
      signal: options.signal ?? null,
      deadline: timeoutMs > 0 ? Date.now() + timeoutMs : null,
      logger: options.logger ?? this.logger,
    });
    const root = run.execute();
    return new Tree(root, language, reader.buffer ?? reader.readAll());
  }
}

/** State of a single parse */
class ParseRun {
  private readonly lexer: Lexer;
  private readonly stack = new ParseStack();
  private readonly reusable: ReusableNodes | null;
  private root: Subtree | null = null;
  private lastRecovery = -1;
  private operations = 0;
  private nextCheck = 0;

  constructor(
    private readonly language: Language,
    reader: InputReader,
    oldRoot: Subtree | null,
    private readonly settings: RunSettings
  ) {
    this.lexer = new Lexer(reader);
    this.reusable = oldRoot ? new ReusableNodes(oldRoot) : null;
  }

  execute(): Subtree {
    for (;;) {
      this.checkpoint();
      if (this.reusable && this.tryReuse(this.reusable)) {
        if (this.root) return this.root;
        continue;
      }
      const lookahead = this.lex(this.language.lexModeFor(this.stack.state));
      if (this.consume(lookahead)) break;
    }
    if (!this.root) throw new Error("Parse finished without a root");
    return this.root;
  }

  private checkpoint(): void {
    this.operations++;
    const work = this.operations + this.lexer.advanceCount;
    if (work < this.nextCheck) return;
    this.nextCheck = work + this.settings.cancellationCheckInterval;
    if (this.settings.signal?.aborted) throw new ParseCancelledError("aborted");
    if (this.settings.deadline !== null && Date.now() > this.settings.deadline) {
      throw new ParseCancelledError("timeout");
    }
  }

  private log(message: string): void {
    this.settings.logger?.("parse", message);
  }

  private name(symbol: number): string {
    return this.language.symbolName(symbol);
  }

  /** Read the next token at the top of the stack */
  private lex(mode: LexMode): Subtree {
    const position = this.stack.position;
    this.lexer.resetTo(position.bytes, lengthToPoint(position));
    return this.readToken(mode);
  }

  private readToken(mode: LexMode): Subtree {
    const token = this.lexer.lex(this.language, mode);
    this.settings.logger?.(
      "lex",
      `lexed_lookahead sym:${this.name(token.symbol)} size:${token.size.bytes}`
    );
    return createLeaf(this.language, {
      symbol: token.symbol,
      padding: token.padding,
      size: token.size,
      parseState: this.stack.state,
      lexMode: token.lexMode,
      lookaheadBytes: token.lookaheadBytes,
    });
  }

  /**
   * Try to continue from the old tree instead of lexing. Returns false when
   * nothing there can be used at the current position.
   */
  private tryReuse(reusable: ReusableNodes): boolean {
    const position = this.stack.position.bytes;
    const chain = reusable.candidatesAt(position);
    const leaf = chain[chain.length - 1];
    if (!leaf || !leaf.isLeaf || !isReusable(leaf)) return false;
    if (!sameLexMode(leaf.lexMode, this.language.lexModeFor(this.stack.state))) return false;

    const dependencyEnd = position + leaf.dependencyEnd;
    for (;;) {
      const action = this.language.action(this.stack.state, leaf.symbol);
      if (!action || action.type !== "reduce") break;
      this.checkpoint();
      this.reduce(action.production, dependencyEnd);
    }

    const state = this.stack.state;
    const action = this.language.action(state, leaf.symbol);
    if (action?.type === "shift") {
      for (const candidate of chain) {
        if (candidate.isLeaf) {
          this.log(`reuse_node sym:${this.name(candidate.symbol)}`);
          this.stack.push(action.state, this.asShifted(candidate, state, false), false);
          return true;
        }
        if (!isReusable(candidate) || candidate.isExtra || candidate.parseState !== state) continue;
        const next = this.language.goto(state, candidate.symbol);
        if (next === null) continue;
        this.log(`reuse_node sym:${this.name(candidate.symbol)} size:${candidate.size.bytes}`);
        this.stack.push(next, candidate, false);
        return true;
      }
    }

    this.consume(leaf);
    return true;
  }

  /** Leaf as it should sit on the stack in `state` */
  private asShifted(leaf: Subtree, state: number, extra: boolean): Subtree {
    if (leaf.parseState === state && leaf.isExtra === extra) return leaf;
    return leaf.with({ parseState: state, extra });
  }

  /**
   * Feed one lookahead token through the tables. Returns true once the
   * input has been accepted.
   */
  private consume(lookahead: Subtree): boolean {
    const dependencyEnd = this.stack.position.bytes + lookahead.dependencyEnd;
    for (;;) {
      const state = this.stack.state;
      const action = this.language.action(state, lookahead.symbol);
      if (!action) {
        if (lookahead.symbol !== END_SYMBOL && this.language.isExtra(lookahead.symbol)) {
          this.log(`shift_extra sym:${this.name(lookahead.symbol)}`);
          this.stack.push(state, this.asShifted(lookahead, state, true), true);
          return false;
        }
        return this.recover(lookahead);
      }
      if (action.type === "reduce") {
        this.checkpoint();
        this.reduce(action.production, dependencyEnd);
        continue;
      }
      if (action.type === "shift") {
        this.log(`shift state:${action.state}`);
        this.stack.push(action.state, this.asShifted(lookahead, state, false), false);
        return false;
      }
      this.accept(lookahead);
      return true;
    }
  }

  private reduce(productionId: number, dependencyEnd: number): void {
    const production = this.language.production(productionId);
    const { children, trailingExtras } = this.stack.popForReduce(production.length);
    const below = this.stack.state;
    const next = this.language.goto(below, production.lhs);
    if (next === null) {
      throw new InvalidLanguageError(
        `state ${below} has no goto for ${this.name(production.lhs)}`
      );
    }
    const node = createNode(this.language, production.lhs, children, {
      productionId,
      parseState: below,
      lookaheadEnd: dependencyEnd - this.stack.position.bytes,
    });
    this.log(`reduce sym:${this.name(production.lhs)} child_count:${children.length}`);
    this.stack.push(next, node, false);
    for (const extra of trailingExtras) this.stack.push(next, extra, true);
  }

  private accept(eof: Subtree): void {
    const subtrees = this.stack.subtrees();
    const start = subtrees.find((s) => !s.isExtra);
    const children: Subtree[] = [];
    for (const subtree of subtrees) {
      if (subtree === start) children.push(...subtree.children);
      else children.push(subtree);
    }
    children.push(this.asShifted(eof, this.stack.state, true));
    this.root = createNode(this.language, start ? start.symbol : ERROR_SYMBOL, children, {
      productionId: start ? start.productionId : -1,
      parseState: 0,
    });
    this.log("accept");
  }

  /**
   * Recover from a lookahead with no action. Returns true when recovery
   * had to end the parse.
   */
  private recover(lookahead: Subtree): boolean {
    const position = this.stack.position;
    this.log(`detect_error sym:${this.name(lookahead.symbol)}`);
    const allowInPlace = this.lastRecovery !== position.bytes;
    this.lastRecovery = position.bytes;

    const window = this.readWindow(lookahead, position);
    const tokens = window.filter((leaf) => !leaf.isExtra);
    const candidate = findRecovery(this.language, {
      states: this.stack.states(),
      popCosts: this.stack.popCosts(),
      tokens: tokens.map((leaf) => leaf.symbol),
      lookahead: this.settings.recoveryLookahead,
      confirm: this.settings.recoveryConfirmTokens,
      allowInPlace,
      checkpoint: () => this.checkpoint(),
    });

    if (candidate) {
      this.log(
        `recover pops:${candidate.pops} skips:${candidate.skips} cost:${candidate.cost}`
      );
      return this.applyRecovery(candidate, window, tokens);
    }

    if (lookahead.symbol === END_SYMBOL) {
      this.log("recover_eof");
      const children = [...this.stack.subtrees(), this.asShifted(lookahead, this.stack.state, true)];
      this.root = createNode(this.language, ERROR_SYMBOL, children, {
        productionId: -1,
        parseState: 0,
      });
      return true;
    }

    this.log(`skip_token sym:${this.name(lookahead.symbol)}`);
    this.pushError([lookahead]);
    return false;
  }

  /**
   * Tokens from the failing lookahead onward, read in the error lex mode.
   * Extras are kept but do not count toward the window size.
   */
  private readWindow(lookahead: Subtree, position: Length): Subtree[] {
    const window = [lookahead];
    if (lookahead.symbol === END_SYMBOL) return window;
    const limit = this.settings.recoveryLookahead + this.settings.recoveryConfirmTokens;
    const errorMode: LexMode = { lexState: this.language.errorLexState, externalState: -1 };
    const end = lengthAdd(position, lookahead.total);
    this.lexer.resetTo(end.bytes, lengthToPoint(end));
    let count = 1;
    while (count < limit) {
      this.checkpoint();
      const leaf = this.readToken(errorMode);
      const extra = leaf.symbol !== END_SYMBOL && this.language.isExtra(leaf.symbol);
      window.push(extra ? leaf.with({ extra: true }) : leaf);
      if (leaf.symbol === END_SYMBOL) break;
      if (!extra) count++;
    }
    return window;
  }

  private applyRecovery(
    candidate: RecoveryCandidate,
    window: readonly Subtree[],
    tokens: readonly Subtree[]
  ): boolean {
    const lookahead = tokens[0];
    if (!lookahead) return false;

    if (candidate.missing !== null) {
      const state = this.stack.state;
      this.log(`insert_missing sym:${this.name(candidate.missing)}`);
      const missing = createLeaf(this.language, {
        symbol: candidate.missing,
        padding: ZERO_LENGTH,
        size: ZERO_LENGTH,
        parseState: state,
        lexMode: this.language.lexModeFor(state),
        lookaheadBytes: 0,
        missing: true,
      });
      if (this.consume(missing)) return true;
      return this.consume(lookahead);
    }

    const resume = tokens[candidate.skips];
    if (!resume) return false;
    const resumeIndex = window.indexOf(resume);
    const discarded = [
      ...this.stack.popFrames(candidate.pops),
      ...window.slice(0, resumeIndex),
    ];
    if (discarded.length > 0) this.pushError(discarded);
    return this.consume(resume);
  }

  /**
   * Wrap `subtrees` in an ERROR node and push it as an extra, merging with
   * an ERROR node already on top of the stack.
   */
  private pushError(subtrees: readonly Subtree[]): void {
    const children: Subtree[] = [];
    const previous = this.stack.popTopError();
    if (previous) children.push(...previous.children);
    for (const subtree of subtrees) {
      if (subtree.isError && subtree.isExtra) children.push(...subtree.children);
      else children.push(subtree);
    }
    const state = this.stack.state;
    const error = createNode(this.language, ERROR_SYMBOL, children, {
      productionId: -1,
      parseState: state,
      extra: true,
    });
    this.stack.push(state, error, true);
  }
}

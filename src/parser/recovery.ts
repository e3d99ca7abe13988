/**
 * Error recovery search.
 *
 * When the lookahead has no action, the parser looks for the cheapest way
 * to continue: pop frames off the stack, skip tokens from the input, or
 * pretend one token was present. Each candidate is checked by running the
 * parse tables over the next few tokens without building anything.
 */

import { END_SYMBOL, type Language } from "../language/language.js";

export interface RecoveryCandidate {
  /** Non-extra stack frames to discard */
  pops: number;
  /** Real tokens to discard from the input window */
  skips: number;
  /** Symbol to insert as a MISSING leaf, or null */
  missing: number | null;
  cost: number;
}

export interface RecoverySearch {
  /** Non-extra stack states, bottom first */
  states: readonly number[];
  /** Entry k is the token cost of popping k frames */
  popCosts: readonly number[];
  /** Symbols of the real (non-extra) tokens ahead, starting with the one that failed */
  tokens: readonly number[];
  lookahead: number;
  confirm: number;
  /** False forbids candidates that resume at the failing token */
  allowInPlace: boolean;
  /** Called once per candidate so long searches stay cancellable */
  checkpoint?: () => void;
}

/** Cost of inserting one MISSING token */
export const MISSING_COST = 2;

/**
 * Run the tables over `symbols` starting from the state stack
 * `states[0..height)`. Succeeds when every symbol is consumed or the
 * input is accepted.
 */
export function simulate(
  language: Language,
  states: readonly number[],
  height: number,
  symbols: readonly number[]
): boolean {
  if (height < 1) return false;
  // States above `base` live in `overlay`; below it they are read from `states`.
  let base = height;
  const overlay: number[] = [];
  const top = (): number => overlay[overlay.length - 1] ?? states[base - 1] ?? 0;
  const pop = (count: number): void => {
    const fromOverlay = Math.min(count, overlay.length);
    overlay.length -= fromOverlay;
    base -= count - fromOverlay;
  };

  for (const symbol of symbols) {
    for (;;) {
      const action = language.action(top(), symbol);
      if (!action) return false;
      if (action.type === "accept") return true;
      if (action.type === "shift") {
        overlay.push(action.state);
        break;
      }
      const production = language.production(action.production);
      pop(production.length);
      if (base < 1) return false;
      const next = language.goto(top(), production.lhs);
      if (next === null) return false;
      overlay.push(next);
    }
  }
  return true;
}

function compareCandidates(a: RecoveryCandidate, b: RecoveryCandidate): number {
  return (
    a.cost - b.cost ||
    a.skips - b.skips ||
    a.pops - b.pops ||
    (a.missing ?? -1) - (b.missing ?? -1)
  );
}

function pickCheaper(
  best: RecoveryCandidate | null,
  candidate: RecoveryCandidate
): RecoveryCandidate {
  return best && compareCandidates(best, candidate) <= 0 ? best : candidate;
}

/**
 * Cheapest valid candidate, ordered by cost, then skipped tokens, then
 * popped frames, then inserted symbol id. Null when nothing in the window
 * lets the parse continue.
 */
export function findRecovery(language: Language, search: RecoverySearch): RecoveryCandidate | null {
  const { states, popCosts, tokens, confirm } = search;
  let best: RecoveryCandidate | null = null;

  const state = states[states.length - 1] ?? 0;
  if (search.allowInPlace) {
    const ahead = tokens.slice(0, confirm);
    for (const symbol of language.validSymbols(state)) {
      if (symbol === END_SYMBOL || language.isExtra(symbol)) continue;
      search.checkpoint?.();
      if (simulate(language, states, states.length, [symbol, ...ahead])) {
        best = { pops: 0, skips: 0, missing: symbol, cost: MISSING_COST };
        break;
      }
    }
  }

  const skipLimit = Math.min(search.lookahead, tokens.length);
  for (let skips = search.allowInPlace ? 0 : 1; skips < skipLimit; skips++) {
    if (best && skips > best.cost) break;
    const ahead = tokens.slice(skips, skips + confirm);
    for (let pops = 0; pops < popCosts.length && pops < states.length; pops++) {
      const cost = (popCosts[pops] ?? 0) + skips;
      if (best && cost > best.cost) break;
      search.checkpoint?.();
      if (simulate(language, states, states.length - pops, ahead)) {
        best = pickCheaper(best, { pops, skips, missing: null, cost });
      }
    }
  }

  return best;
}

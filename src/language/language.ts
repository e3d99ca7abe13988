/**
 * Loaded grammar tables.
 *
 * A Language is immutable once `loadLanguage` returns. It can be shared by
 * any number of parsers, trees and queries; `delete()` invalidates all of
 * them.
 */

import {
  InvalidLanguageError,
  LanguageVersionMismatchError,
  ReleasedHandleError,
} from "../errors.js";
import type {
  ActionEntry,
  ExternalScanner,
  LanguageBlob,
  LexMode,
  LexState,
  LexTransition,
  ParseAction,
} from "./types.js";

export const LANGUAGE_VERSION = 2;
export const MIN_COMPATIBLE_LANGUAGE_VERSION = 1;

export const END_SYMBOL = 0;
export const ERROR_SYMBOL = 0xffff;

interface SymbolInfo {
  name: string;
  named: boolean;
  visible: boolean;
}

interface Production {
  lhs: number;
  length: number;
  fieldsBySlot: Map<number, number>;
}

interface ParseState {
  lexMode: LexMode;
  actions: Map<number, ParseAction>;
  gotos: Map<number, number>;
}

export interface LoadLanguageOptions {
  externalScanner?: ExternalScanner;
}

let nextLanguageId = 1;

export class Language {
  /** Unique per load; used to tell languages apart cheaply */
  readonly id: number;
  readonly name: string;
  readonly version: number;
  readonly tokenCount: number;
  readonly fields: readonly string[];
  readonly externalScanner: ExternalScanner | null;
  readonly errorLexState: number;
  /** Every symbol the external scanner can produce */
  readonly externalTokens: ReadonlySet<number>;

  private readonly symbols: SymbolInfo[];
  private readonly productions: Production[];
  private readonly states: ParseState[];
  private readonly lexStates: LexState[];
  private readonly extras: Set<number>;
  private readonly externalStates: ReadonlySet<number>[];
  private readonly symbolsByName = new Map<string, number[]>();
  private released = false;

  /** @internal Use loadLanguage */
  constructor(blob: LanguageBlob, options: LoadLanguageOptions) {
    this.id = nextLanguageId++;
    this.name = blob.name;
    this.version = blob.version;
    this.tokenCount = blob.tokenCount;
    this.fields = [...(blob.fields ?? [])];
    this.externalScanner = options.externalScanner ?? null;
    this.errorLexState = blob.errorLexState ?? 0;

    this.symbols = blob.symbols.map((s) => ({
      name: s.name,
      named: s.named ?? false,
      visible: s.visible ?? true,
    }));
    this.symbols.forEach((s, id) => this.indexSymbolName(s.name, s.named, id));
    this.indexSymbolName("ERROR", true, ERROR_SYMBOL);

    this.productions = blob.productions.map((p) => ({
      lhs: p.lhs,
      length: p.length,
      fieldsBySlot: new Map((p.fields ?? []).map((f): [number, number] => [f.slot, f.field])),
    }));

    this.states = blob.states.map((s) => ({
      lexMode: { lexState: s.lex, externalState: s.external ?? 0 },
      actions: new Map(
        Object.entries(s.actions).map(([sym, action]): [number, ParseAction] => [
          Number(sym),
          toAction(action),
        ])
      ),
      gotos: new Map(
        Object.entries(s.gotos ?? {}).map(([sym, state]): [number, number] => [Number(sym), state])
      ),
    }));

    this.lexStates = blob.lexStates.map((s) => ({
      accept: s.accept ?? -1,
      transitions: s.transitions
        .map(
          (t): LexTransition => ({ lo: t[0], hi: t[1], next: t[2], skip: t[3] ?? false })
        )
        .sort((a, b) => a.lo - b.lo),
    }));

    this.extras = new Set(blob.extras ?? []);
    this.externalTokens = new Set(blob.externalTokens ?? []);
    this.externalStates = (blob.externalStates ?? [[]]).map((set) => new Set(set));
  }

  private indexSymbolName(name: string, named: boolean, id: number): void {
    const key = `${named ? "n" : "a"}:${name}`;
    const ids = this.symbolsByName.get(key);
    if (ids) ids.push(id);
    else this.symbolsByName.set(key, [id]);
  }

  get symbolCount(): number {
    return this.symbols.length;
  }

  get stateCount(): number {
    return this.states.length;
  }

  get isReleased(): boolean {
    return this.released;
  }

  assertAlive(): void {
    if (this.released) throw new ReleasedHandleError(`Language "${this.name}"`);
  }

  /**
   * Release the language. Parsers, trees and queries built from it throw on
   * their next use.
   */
  delete(): void {
    this.released = true;
  }

  symbolName(symbol: number): string {
    if (symbol === ERROR_SYMBOL) return "ERROR";
    return this.symbols[symbol]?.name ?? "";
  }

  isNamed(symbol: number): boolean {
    if (symbol === ERROR_SYMBOL) return true;
    return this.symbols[symbol]?.named ?? false;
  }

  isVisible(symbol: number): boolean {
    if (symbol === ERROR_SYMBOL) return true;
    return this.symbols[symbol]?.visible ?? false;
  }

  isTerminal(symbol: number): boolean {
    return symbol < this.tokenCount;
  }

  isExtra(symbol: number): boolean {
    return this.extras.has(symbol);
  }

  /**
   * All symbol ids with the given name. Several ids may share a name when a
   * grammar aliases one rule under different names.
   */
  symbolsForName(name: string, named: boolean): readonly number[] {
    return this.symbolsByName.get(`${named ? "n" : "a"}:${name}`) ?? [];
  }

  symbolForName(name: string, named: boolean): number | null {
    return this.symbolsForName(name, named)[0] ?? null;
  }

  fieldIdForName(name: string): number | null {
    const id = this.fields.indexOf(name);
    return id < 0 ? null : id;
  }

  fieldNameForId(id: number): string | null {
    return this.fields[id] ?? null;
  }

  action(state: number, symbol: number): ParseAction | null {
    return this.states[state]?.actions.get(symbol) ?? null;
  }

  goto(state: number, symbol: number): number | null {
    return this.states[state]?.gotos.get(symbol) ?? null;
  }

  /** Terminal symbols with an action in `state`, in id order */
  validSymbols(state: number): number[] {
    const actions = this.states[state]?.actions;
    if (!actions) return [];
    return [...actions.keys()].sort((a, b) => a - b);
  }

  lexModeFor(state: number): LexMode {
    return this.states[state]?.lexMode ?? { lexState: 0, externalState: 0 };
  }

  lexState(id: number): LexState | null {
    return this.lexStates[id] ?? null;
  }

  /** Valid external symbols for a lex mode; a negative state allows all of them */
  externalValidSymbols(externalState: number): ReadonlySet<number> {
    if (externalState < 0) return this.externalTokens;
    return this.externalStates[externalState] ?? EMPTY_SET;
  }

  production(id: number): Production {
    const production = this.productions[id];
    if (!production) throw new InvalidLanguageError(`unknown production ${id}`);
    return production;
  }

  /** Field id assigned to `slot` of `production`, or null */
  fieldForSlot(production: number, slot: number): number | null {
    if (production < 0) return null;
    return this.productions[production]?.fieldsBySlot.get(slot) ?? null;
  }

  /** Fields a production assigns, as [slot, fieldId] pairs */
  fieldsForProduction(production: number): ReadonlyMap<number, number> {
    return this.productions[production]?.fieldsBySlot ?? EMPTY_MAP;
  }
}

const EMPTY_SET: ReadonlySet<number> = new Set();
const EMPTY_MAP: ReadonlyMap<number, number> = new Map();

function toAction(entry: ActionEntry): ParseAction {
  if (entry[0] === "shift") return { type: "shift", state: entry[1] };
  if (entry[0] === "reduce") return { type: "reduce", production: entry[1] };
  return { type: "accept" };
}

/**
 * Load a grammar table blob.
 *
 * @param blob - JSON text, UTF-8 encoded JSON, or an already parsed object
 * @throws LanguageVersionMismatchError when the table version is unsupported
 * @throws InvalidLanguageError when the blob is malformed
 */
export function loadLanguage(
  blob: string | Uint8Array | unknown,
  options: LoadLanguageOptions = {}
): Language {
  let raw: unknown = blob;
  if (typeof blob === "string" || blob instanceof Uint8Array) {
    const text = typeof blob === "string" ? blob : new TextDecoder().decode(blob);
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new InvalidLanguageError(
        `not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  if (!isRecord(raw)) throw new InvalidLanguageError("expected an object");
  const version = raw.version;
  if (typeof version !== "number" || !Number.isInteger(version)) {
    throw new InvalidLanguageError("missing version");
  }
  if (version < MIN_COMPATIBLE_LANGUAGE_VERSION || version > LANGUAGE_VERSION) {
    throw new LanguageVersionMismatchError(
      version,
      MIN_COMPATIBLE_LANGUAGE_VERSION,
      LANGUAGE_VERSION
    );
  }

  return new Language(validateBlob(raw, version), options);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function fail(reason: string): never {
  throw new InvalidLanguageError(reason);
}

function validateBlob(raw: Record<string, unknown>, version: number): LanguageBlob {
  const name = typeof raw.name === "string" ? raw.name : fail("missing name");
  const tokenCount = isInt(raw.tokenCount) ? raw.tokenCount : fail("missing tokenCount");

  if (!Array.isArray(raw.symbols)) fail("missing symbols");
  const symbols = raw.symbols.map((s, i) => {
    if (!isRecord(s) || typeof s.name !== "string") fail(`symbol ${i} has no name`);
    return {
      name: s.name,
      named: s.named === true,
      visible: s.visible !== false,
    };
  });
  const symbolCount = symbols.length;
  if (tokenCount < 1 || tokenCount > symbolCount) fail("tokenCount out of range");
  const isSymbol = (v: unknown): v is number => isInt(v) && v < symbolCount;

  const fields = raw.fields === undefined ? [] : raw.fields;
  if (!Array.isArray(fields) || !fields.every((f) => typeof f === "string")) {
    fail("fields must be a list of names");
  }
  const fieldNames = fields.filter((f): f is string => typeof f === "string");

  const extras = raw.extras === undefined ? [] : raw.extras;
  if (!Array.isArray(extras) || !extras.every(isSymbol)) fail("extras must be symbol ids");

  if (!Array.isArray(raw.productions)) fail("missing productions");
  const productions = raw.productions.map((p, i) => {
    if (!isRecord(p) || !isSymbol(p.lhs) || !isInt(p.length)) fail(`production ${i} is malformed`);
    if (p.lhs < tokenCount) fail(`production ${i} reduces to a terminal`);
    const pf = p.fields === undefined ? [] : p.fields;
    if (!Array.isArray(pf)) fail(`production ${i} fields must be a list`);
    return {
      lhs: p.lhs,
      length: p.length,
      fields: pf.map((f) => {
        if (!isRecord(f) || !isInt(f.field) || !isInt(f.slot)) {
          fail(`production ${i} has a malformed field`);
        }
        if (f.field >= fieldNames.length) fail(`production ${i} names unknown field ${f.field}`);
        return { field: f.field, slot: f.slot };
      }),
    };
  });

  if (!Array.isArray(raw.lexStates)) fail("missing lexStates");
  const lexStateCount = raw.lexStates.length;
  const lexStates = raw.lexStates.map((s, i) => {
    if (!isRecord(s) || !Array.isArray(s.transitions)) fail(`lex state ${i} is malformed`);
    if (s.accept !== undefined && !isSymbol(s.accept)) fail(`lex state ${i} accepts an unknown symbol`);
    return {
      accept: s.accept,
      transitions: s.transitions.map((t): [number, number, number, boolean] => {
        if (
          !Array.isArray(t) ||
          !isInt(t[0]) ||
          !isInt(t[1]) ||
          !isInt(t[2]) ||
          t[2] >= lexStateCount ||
          t[0] > t[1]
        ) {
          fail(`lex state ${i} has a malformed transition`);
        }
        return [t[0], t[1], t[2], t[3] === true];
      }),
    };
  });

  const externalTokens = raw.externalTokens === undefined ? [] : raw.externalTokens;
  if (!Array.isArray(externalTokens) || !externalTokens.every(isSymbol)) {
    fail("externalTokens must be symbol ids");
  }
  const externalStates = raw.externalStates === undefined ? [[]] : raw.externalStates;
  if (
    !Array.isArray(externalStates) ||
    !externalStates.every((set) => Array.isArray(set) && set.every(isSymbol))
  ) {
    fail("externalStates must be lists of symbol ids");
  }

  if (!Array.isArray(raw.states) || raw.states.length === 0) fail("missing states");
  const stateCount = raw.states.length;
  const states = raw.states.map((s, i) => {
    if (!isRecord(s) || !isInt(s.lex) || s.lex >= lexStateCount) fail(`state ${i} has no lex state`);
    if (s.external !== undefined && (!isInt(s.external) || s.external >= externalStates.length)) {
      fail(`state ${i} has an unknown external state`);
    }
    if (!isRecord(s.actions)) fail(`state ${i} has no actions`);
    const actions: Record<string, ActionEntry> = {};
    for (const [sym, action] of Object.entries(s.actions)) {
      const symbol = Number(sym);
      if (!isInt(symbol) || symbol >= tokenCount) fail(`state ${i} has an action on non-terminal ${sym}`);
      actions[sym] = validateAction(action, i, stateCount, productions.length);
    }
    const gotos: Record<string, number> = {};
    for (const [sym, target] of Object.entries(isRecord(s.gotos) ? s.gotos : {})) {
      const symbol = Number(sym);
      if (!isInt(symbol) || symbol < tokenCount || symbol >= symbolCount) {
        fail(`state ${i} has a goto on terminal ${sym}`);
      }
      if (!isInt(target) || target >= stateCount) fail(`state ${i} goto targets unknown state`);
      gotos[sym] = target;
    }
    return {
      lex: s.lex,
      external: isInt(s.external) ? s.external : undefined,
      actions,
      gotos,
    };
  });

  const errorLexState = raw.errorLexState === undefined ? 0 : raw.errorLexState;
  if (!isInt(errorLexState) || errorLexState >= lexStateCount) fail("errorLexState out of range");

  return {
    version,
    name,
    tokenCount,
    symbols,
    fields: fieldNames,
    extras,
    productions,
    states,
    lexStates,
    errorLexState,
    externalTokens,
    externalStates,
  };
}

function validateAction(
  action: unknown,
  state: number,
  stateCount: number,
  productionCount: number
): ActionEntry {
  if (!Array.isArray(action)) fail(`state ${state} has a malformed action`);
  const [kind, target] = action;
  if (kind === "accept") return ["accept"];
  if (kind === "shift" && isInt(target) && target < stateCount) return ["shift", target];
  if (kind === "reduce" && isInt(target) && target < productionCount) return ["reduce", target];
  return fail(`state ${state} has a malformed action`);
}

/**
 * Query Parser
 *
 * Parses the S-expression pattern language into a pattern AST, resolving
 * node kinds and field names against a Language as it goes.
 *
 * Grammar:
 *   Query     ::= Item*
 *   Item      ::= (Field ":")? Primary Suffix*
 *   Primary   ::= "(" Kind Element* ")" | "(" Element+ ")" | "[" Item+ "]"
 *               | String | "_"
 *   Element   ::= Item | "." | "!" Field | "(" "#" Name Arg* ")"
 *   Suffix    ::= "?" | "*" | "+" | "@" Name
 */

import { QueryCompileError, type QueryErrorKind } from "../errors.js";
import { ERROR_SYMBOL, type Language } from "../language/language.js";
import type {
  LocatedPredicate,
  NodeMatcher,
  ParsedPattern,
  Pattern,
  PatternElement,
  PatternItem,
  PredicateArgument,
  Quantifier,
} from "./types.js";

/**
 * Token types for lexing
 */
type Token =
  | { type: "lparen"; offset: number }
  | { type: "rparen"; offset: number }
  | { type: "lbracket"; offset: number }
  | { type: "rbracket"; offset: number }
  | { type: "anchor"; offset: number } // .
  | { type: "quantifier"; value: Quantifier; offset: number }
  | { type: "string"; value: string; offset: number }
  | { type: "identifier"; value: string; offset: number }
  | { type: "field"; value: string; offset: number } // name:
  | { type: "negated"; value: string; offset: number } // !name
  | { type: "capture"; value: string; offset: number } // @name
  | { type: "predicate"; value: string; offset: number }; // #name?

const WORD = /[A-Za-z0-9_\-]/;
/** Dots may follow the first character, as in `fold.text` */
const DOTTED_WORD = /[A-Za-z0-9_\-.]/;

const encoder = new TextEncoder();

/**
 * Build a QueryCompileError located at a UTF-16 index of `source`.
 */
export function queryError(
  source: string,
  kind: QueryErrorKind,
  reason: string,
  index: number
): QueryCompileError {
  const before = source.slice(0, index);
  const row = before.split("\n").length - 1;
  const column = index - (before.lastIndexOf("\n") + 1);
  return new QueryCompileError(kind, reason, encoder.encode(before).length, row, column);
}

/**
 * Lexer: convert query text to tokens
 */
function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const readWhile = (pattern: RegExp): string => {
    const start = i;
    while (i < source.length && pattern.test(source.charAt(i))) i++;
    return source.slice(start, i);
  };

  while (i < source.length) {
    const ch = source.charAt(i);
    const offset = i;

    // Skip whitespace
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Comments run to end of line
    if (ch === ";") {
      while (i < source.length && source.charAt(i) !== "\n") i++;
      continue;
    }

    if (ch === "(") {
      tokens.push({ type: "lparen", offset });
      i++;
      continue;
    }
    if (ch === ")") {
      tokens.push({ type: "rparen", offset });
      i++;
      continue;
    }
    if (ch === "[") {
      tokens.push({ type: "lbracket", offset });
      i++;
      continue;
    }
    if (ch === "]") {
      tokens.push({ type: "rbracket", offset });
      i++;
      continue;
    }
    if (ch === ".") {
      tokens.push({ type: "anchor", offset });
      i++;
      continue;
    }
    if (ch === "?" || ch === "*" || ch === "+") {
      tokens.push({ type: "quantifier", value: ch, offset });
      i++;
      continue;
    }

    // String literal
    if (ch === '"') {
      i++;
      let str = "";
      let closed = false;
      while (i < source.length) {
        const c = source.charAt(i);
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        if (c === "\\") {
          i++;
          const escaped = source.charAt(i);
          switch (escaped) {
            case "n":
              str += "\n";
              break;
            case "t":
              str += "\t";
              break;
            case "r":
              str += "\r";
              break;
            case "0":
              str += "\0";
              break;
            default:
              str += escaped;
          }
          i++;
          continue;
        }
        str += c;
        i++;
      }
      if (!closed) throw queryError(source, "syntax", "Unterminated string", offset);
      tokens.push({ type: "string", value: str, offset });
      continue;
    }

    if (ch === "@") {
      i++;
      const name = readWhile(DOTTED_WORD);
      if (!name) throw queryError(source, "syntax", "Expected a capture name after @", offset);
      tokens.push({ type: "capture", value: name, offset });
      continue;
    }

    if (ch === "#") {
      i++;
      let name = readWhile(WORD);
      if (source.charAt(i) === "?" || source.charAt(i) === "!") {
        name += source.charAt(i);
        i++;
      }
      if (!name) throw queryError(source, "syntax", "Expected a predicate name after #", offset);
      tokens.push({ type: "predicate", value: name, offset });
      continue;
    }

    if (ch === "!") {
      i++;
      const name = readWhile(WORD);
      if (!name) throw queryError(source, "syntax", "Expected a field name after !", offset);
      tokens.push({ type: "negated", value: name, offset });
      continue;
    }

    if (WORD.test(ch)) {
      const word = readWhile(DOTTED_WORD);
      if (source.charAt(i) === ":") {
        i++;
        tokens.push({ type: "field", value: word, offset });
      } else {
        tokens.push({ type: "identifier", value: word, offset });
      }
      continue;
    }

    throw queryError(source, "syntax", `Unexpected character '${ch}'`, offset);
  }

  return tokens;
}

interface CaptureReference {
  name: string;
  offset: number;
}

/**
 * Parser: convert tokens to patterns
 */
class QueryParser {
  private pos = 0;
  private predicates: LocatedPredicate[] = [];
  private definedCaptures = new Set<string>();
  private referencedCaptures: CaptureReference[] = [];

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
    private readonly language: Language,
    private readonly captureNames: string[]
  ) {}

  private peek(ahead = 0): Token | undefined {
    return this.tokens[this.pos + ahead];
  }

  private error(kind: QueryErrorKind, reason: string, offset?: number): QueryCompileError {
    return queryError(this.source, kind, reason, offset ?? this.peek()?.offset ?? this.source.length);
  }

  private unexpected(): QueryCompileError {
    const token = this.peek();
    if (!token) return this.error("syntax", "Unexpected end of query");
    return this.error("syntax", `Unexpected ${describe(token)}`);
  }

  private captureId(name: string): number {
    const existing = this.captureNames.indexOf(name);
    if (existing >= 0) return existing;
    this.captureNames.push(name);
    return this.captureNames.length - 1;
  }

  parse(): ParsedPattern[] {
    const patterns: ParsedPattern[] = [];
    while (this.peek()) {
      const start = this.peek()?.offset ?? 0;
      this.predicates = [];
      this.definedCaptures = new Set();
      this.referencedCaptures = [];

      const item = this.parseItem(true);
      for (const ref of this.referencedCaptures) {
        if (!this.definedCaptures.has(ref.name)) {
          throw this.error("capture", `Capture @${ref.name} is not defined in this pattern`, ref.offset);
        }
      }
      patterns.push({ item, predicates: this.predicates, offset: start });
    }
    return patterns;
  }

  private parseItem(topLevel: boolean): PatternItem {
    const first = this.peek();
    if (!first) throw this.unexpected();
    const offset = first.offset;

    let field: number | null = null;
    if (first.type === "field") {
      if (topLevel) throw this.error("structure", "Fields are only allowed on child patterns");
      field = this.language.fieldIdForName(first.value);
      if (field === null) throw this.error("field", `Invalid field name ${first.value}`);
      this.pos++;
    }

    const pattern = this.parsePrimary(topLevel);
    let quantifier: Quantifier | null = null;
    const captures: number[] = [];
    for (;;) {
      const token = this.peek();
      if (token?.type === "quantifier") {
        if (quantifier) throw this.error("syntax", "Only one quantifier is allowed");
        quantifier = token.value;
        this.pos++;
      } else if (token?.type === "capture") {
        captures.push(this.captureId(token.value));
        this.definedCaptures.add(token.value);
        this.pos++;
      } else {
        break;
      }
    }

    if (pattern.type === "group" && captures.length > 0) {
      throw this.error("capture", "Captures on grouped sequences are not supported", offset);
    }
    if (pattern.type === "group" && field !== null) {
      throw this.error("structure", "Fields cannot apply to grouped sequences", offset);
    }
    return { pattern, offset, field, quantifier, captures };
  }

  private parsePrimary(topLevel: boolean): Pattern {
    const token = this.peek();
    if (!token) throw this.unexpected();

    if (token.type === "string") {
      this.pos++;
      return {
        type: "node",
        offset: token.offset,
        matcher: this.anonymousMatcher(token.value, token.offset),
        children: [],
        negatedFields: [],
      };
    }

    if (token.type === "identifier" && token.value === "_") {
      this.pos++;
      return {
        type: "node",
        offset: token.offset,
        matcher: { symbols: null, namedOnly: false, missing: false },
        children: [],
        negatedFields: [],
      };
    }

    if (token.type === "lbracket") {
      this.pos++;
      const alternatives: PatternItem[] = [];
      while (this.peek()?.type !== "rbracket") {
        if (!this.peek()) throw this.unexpected();
        alternatives.push(this.parseItem(false));
      }
      this.pos++;
      if (alternatives.length === 0) {
        throw this.error("syntax", "Empty alternation", token.offset);
      }
      return { type: "alternation", offset: token.offset, alternatives };
    }

    if (token.type === "lparen") {
      const next = this.peek(1);
      if (next?.type === "identifier") return this.parseNode(token.offset);
      if (next?.type === "predicate") {
        throw this.error("predicate", "Predicates must appear inside a pattern");
      }
      if (next?.type === "rparen") throw this.error("syntax", "Empty pattern", token.offset);
      this.pos++;
      const children = this.parseChildren(false);
      if (!children.some((c) => c.type === "item")) {
        throw this.error("syntax", "Group contains no patterns", token.offset);
      }
      return { type: "group", offset: token.offset, children };
    }

    if (token.type === "identifier" && topLevel) {
      throw this.error("syntax", `Expected '(' before ${token.value}`);
    }
    throw this.unexpected();
  }

  private parseNode(offset: number): Pattern {
    this.pos++; // (
    const kindToken = this.peek();
    if (kindToken?.type !== "identifier") throw this.unexpected();
    this.pos++;

    let matcher: NodeMatcher;
    let terminal = false;
    const kind = kindToken.value;
    if (kind === "_") {
      matcher = { symbols: null, namedOnly: true, missing: false };
    } else if (kind === "MISSING") {
      const target = this.peek();
      if (target?.type === "identifier" && this.peek(1)?.type === "rparen") {
        this.pos++;
        matcher = { ...this.namedMatcher(target.value, target.offset), missing: true };
      } else if (target?.type === "string") {
        this.pos++;
        matcher = { ...this.anonymousMatcher(target.value, target.offset), missing: true };
      } else {
        matcher = { symbols: null, namedOnly: false, missing: true };
      }
      terminal = true;
    } else if (kind === "ERROR") {
      matcher = { symbols: new Set([ERROR_SYMBOL]), namedOnly: false, missing: false };
    } else {
      matcher = this.namedMatcher(kind, kindToken.offset);
      const symbols = matcher.symbols ? [...matcher.symbols] : [];
      terminal = symbols.length > 0 && symbols.every((s) => this.language.isTerminal(s));
    }

    const negatedFields: number[] = [];
    const children = this.parseChildren(true, negatedFields);
    const firstChild = children.find((c) => c.type === "item");
    if (terminal && firstChild?.type === "item") {
      throw this.error(
        "structure",
        `Node type ${kind} has no children`,
        firstChild.item.offset
      );
    }
    return { type: "node", offset, matcher, children, negatedFields };
  }

  /**
   * Parse elements up to and including the closing paren. Negated fields
   * are only accepted inside a node.
   */
  private parseChildren(inNode: boolean, negatedFields?: number[]): PatternElement[] {
    const children: PatternElement[] = [];
    for (;;) {
      const token = this.peek();
      if (!token) throw this.unexpected();
      if (token.type === "rparen") {
        this.pos++;
        return children;
      }
      if (token.type === "anchor") {
        children.push({ type: "anchor", offset: token.offset });
        this.pos++;
        continue;
      }
      if (token.type === "negated") {
        if (!inNode || !negatedFields) {
          throw this.error("structure", "Negated fields are only allowed inside a node");
        }
        const field = this.language.fieldIdForName(token.value);
        if (field === null) throw this.error("field", `Invalid field name ${token.value}`);
        negatedFields.push(field);
        this.pos++;
        continue;
      }
      if (token.type === "lparen" && this.peek(1)?.type === "predicate") {
        this.predicates.push(this.parsePredicate());
        continue;
      }
      children.push({ type: "item", item: this.parseItem(false) });
    }
  }

  private parsePredicate(): LocatedPredicate {
    const open = this.peek();
    this.pos++; // (
    const name = this.peek();
    if (name?.type !== "predicate") throw this.unexpected();
    this.pos++;

    const args: PredicateArgument[] = [];
    for (;;) {
      const token = this.peek();
      if (!token) throw this.unexpected();
      if (token.type === "rparen") {
        this.pos++;
        break;
      }
      if (token.type === "capture") {
        this.referencedCaptures.push({ name: token.value, offset: token.offset });
        args.push({ type: "capture", name: token.value, id: this.captureId(token.value) });
      } else if (token.type === "string" || token.type === "identifier") {
        args.push({ type: "string", value: token.value });
      } else {
        throw this.error("predicate", `Unexpected ${describe(token)} in predicate`);
      }
      this.pos++;
    }
    return { predicate: { operator: name.value, args }, offset: open?.offset ?? name.offset };
  }

  private namedMatcher(name: string, offset: number): NodeMatcher {
    const symbols = this.language
      .symbolsForName(name, true)
      .filter((s) => this.language.isVisible(s));
    if (symbols.length === 0) throw this.error("node_type", `Invalid node type ${name}`, offset);
    return { symbols: new Set(symbols), namedOnly: false, missing: false };
  }

  private anonymousMatcher(name: string, offset: number): NodeMatcher {
    const symbols = this.language
      .symbolsForName(name, false)
      .filter((s) => this.language.isVisible(s));
    if (symbols.length === 0) throw this.error("node_type", `Invalid node type "${name}"`, offset);
    return { symbols: new Set(symbols), namedOnly: false, missing: false };
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case "lparen":
      return "'('";
    case "rparen":
      return "')'";
    case "lbracket":
      return "'['";
    case "rbracket":
      return "']'";
    case "anchor":
      return "'.'";
    case "string":
      return `string "${token.value}"`;
    case "capture":
      return `capture @${token.value}`;
    case "predicate":
      return `predicate #${token.value}`;
    case "negated":
      return `!${token.value}`;
    case "field":
      return `field ${token.value}:`;
    default:
      return `'${token.value}'`;
  }
}

/**
 * Parse query source into patterns. Capture names are appended to
 * `captureNames` in order of first appearance.
 *
 * @throws QueryCompileError on syntax, node type, field and structure errors
 */
export function parseQuery(
  source: string,
  language: Language,
  captureNames: string[]
): ParsedPattern[] {
  const tokens = tokenize(source);
  return new QueryParser(source, tokens, language, captureNames).parse();
}

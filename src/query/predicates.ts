/**
 * Built-in predicates and directives.
 *
 * Text predicates filter matches after the structural match succeeds.
 * Directives (`#set!`, `#is?`, `#is-not?`, `#offset!`) attach properties
 * to a pattern instead. Anything unrecognized is kept as a general
 * predicate for the caller to interpret.
 */

import type { SyntaxNode } from "../tree/node.js";
import type {
  CaptureOffset,
  LocatedPredicate,
  MatchPredicate,
  PredicateArgument,
  PredicateFactory,
  Properties,
  PropertySetting,
  QueryMatch,
  QueryPredicate,
  TextProvider,
} from "./types.js";

export interface PatternPredicates {
  textPredicates: MatchPredicate[];
  generalPredicates: QueryPredicate[];
  setProperties: Properties;
  /** Every `#set!` in source order, repeats included */
  propertySettings: PropertySetting[];
  assertedProperties: Properties;
  refutedProperties: Properties;
  captureOffsets: ReadonlyMap<number, CaptureOffset>;
}

export class PredicateError extends Error {}

function nodesFor(match: QueryMatch, captureId: number): SyntaxNode[] {
  return match.captures.filter((c) => c.captureId === captureId).map((c) => c.node);
}

function captureArg(operator: string, arg: PredicateArgument | undefined, position: string): number {
  if (arg?.type !== "capture") {
    throw new PredicateError(
      `${position} argument to #${operator} must be a capture name`
    );
  }
  return arg.id;
}

function stringArg(operator: string, arg: PredicateArgument | undefined, position: string): string {
  if (arg?.type !== "string") {
    throw new PredicateError(`${position} argument to #${operator} must be a literal`);
  }
  return arg.value;
}

function expectArity(operator: string, args: readonly PredicateArgument[], count: number): void {
  if (args.length !== count) {
    throw new PredicateError(
      `Wrong number of arguments to #${operator}. Expected ${count}, got ${args.length}`
    );
  }
}

/**
 * Shared shape of the text checks: plain forms require every captured node
 * to pass, `any-` forms require one, `not-` forms invert the test. A capture
 * with no nodes passes the plain forms and fails the `any-` forms.
 */
function eachNode(
  operator: string,
  captureId: number,
  test: (text: string) => boolean
): MatchPredicate {
  const positive = !operator.includes("not-");
  const matchAll = !operator.startsWith("any-");
  return (match, textOf) => {
    for (const node of nodesFor(match, captureId)) {
      const passed = test(textOf(node)) === positive;
      if (!passed && matchAll) return false;
      if (passed && !matchAll) return true;
    }
    return matchAll;
  };
}

function eqPredicate(operator: string, args: readonly PredicateArgument[]): MatchPredicate {
  expectArity(operator, args, 2);
  const captureId = captureArg(operator, args[0], "First");
  const other = args[1];
  if (other?.type === "capture") {
    const positive = !operator.includes("not-");
    return (match, textOf) => {
      const left = nodesFor(match, captureId)[0];
      const right = nodesFor(match, other.id)[0];
      if (!left || !right) return true;
      return (textOf(left) === textOf(right)) === positive;
    };
  }
  const value = stringArg(operator, other, "Second");
  return eachNode(operator, captureId, (text) => text === value);
}

function matchPredicate(operator: string, args: readonly PredicateArgument[]): MatchPredicate {
  expectArity(operator, args, 2);
  const captureId = captureArg(operator, args[0], "First");
  const source = stringArg(operator, args[1], "Second");
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (error) {
    throw new PredicateError(
      `Invalid regular expression in #${operator}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return eachNode(operator, captureId, (text) => regex.test(text));
}

function anyOfPredicate(operator: string, args: readonly PredicateArgument[]): MatchPredicate {
  if (args.length < 2) {
    throw new PredicateError(`#${operator} expects a capture and at least one string`);
  }
  const captureId = captureArg(operator, args[0], "First");
  const values = new Set(args.slice(1).map((arg) => stringArg(operator, arg, "Each following")));
  const positive = operator === "any-of?";
  return (match, textOf) =>
    nodesFor(match, captureId).every((node) => values.has(textOf(node)) === positive);
}

function containsPredicate(operator: string, args: readonly PredicateArgument[]): MatchPredicate {
  expectArity(operator, args, 2);
  const captureId = captureArg(operator, args[0], "First");
  const needle = stringArg(operator, args[1], "Second");
  return eachNode(operator, captureId, (text) => text.includes(needle));
}

const BUILTIN_PREDICATES: Record<string, (operator: string, args: readonly PredicateArgument[]) => MatchPredicate> = {
  "eq?": eqPredicate,
  "not-eq?": eqPredicate,
  "any-eq?": eqPredicate,
  "any-not-eq?": eqPredicate,
  "match?": matchPredicate,
  "not-match?": matchPredicate,
  "any-match?": matchPredicate,
  "any-not-match?": matchPredicate,
  "any-of?": anyOfPredicate,
  "not-any-of?": anyOfPredicate,
  "contains?": containsPredicate,
  "not-contains?": containsPredicate,
  "any-contains?": containsPredicate,
  "any-not-contains?": containsPredicate,
};

/** Reads `key value?` from a property directive */
function propertyArgs(operator: string, args: readonly PredicateArgument[]): [string, string | null] {
  if (args.length < 1 || args.length > 2) {
    throw new PredicateError(`#${operator} expects a key and an optional value`);
  }
  const key = stringArg(operator, args[0], "First");
  const value = args[1] === undefined ? null : stringArg(operator, args[1], "Second");
  return [key, value];
}

function parseOffset(operator: string, arg: PredicateArgument | undefined): number {
  const text = stringArg(operator, arg, "Offset");
  const value = Number(text);
  if (!Number.isInteger(value)) {
    throw new PredicateError(`#${operator} offsets must be integers, got "${text}"`);
  }
  return value;
}

/**
 * Sort a pattern's predicates into text checks, directives and general
 * predicates.
 *
 * @param fail - turns a rejection into the error to throw
 */
export function compilePredicates(
  predicates: readonly LocatedPredicate[],
  custom: Record<string, PredicateFactory>,
  fail: (reason: string, offset: number) => Error
): PatternPredicates {
  const textPredicates: MatchPredicate[] = [];
  const generalPredicates: QueryPredicate[] = [];
  const setProperties: Record<string, string | null> = {};
  const propertySettings: PropertySetting[] = [];
  const assertedProperties: Record<string, string | null> = {};
  const refutedProperties: Record<string, string | null> = {};
  const captureOffsets = new Map<number, CaptureOffset>();

  for (const { predicate, offset } of predicates) {
    const { operator, args } = predicate;
    try {
      const factory = Object.hasOwn(custom, operator) ? custom[operator] : undefined;
      const builtin = Object.hasOwn(BUILTIN_PREDICATES, operator)
        ? BUILTIN_PREDICATES[operator]
        : undefined;
      if (factory) {
        textPredicates.push(factory(args));
      } else if (builtin) {
        textPredicates.push(builtin(operator, args));
      } else if (operator === "set!") {
        const [key, value] = propertyArgs(operator, args);
        setProperties[key] = value;
        propertySettings.push({ key, value });
      } else if (operator === "is?") {
        const [key, value] = propertyArgs(operator, args);
        assertedProperties[key] = value;
      } else if (operator === "is-not?") {
        const [key, value] = propertyArgs(operator, args);
        refutedProperties[key] = value;
      } else if (operator === "offset!") {
        if (args.length !== 3) {
          throw new PredicateError("#offset! expects a capture, a start offset and an end offset");
        }
        const captureId = captureArg(operator, args[0], "First");
        captureOffsets.set(captureId, {
          start: parseOffset(operator, args[1]),
          end: parseOffset(operator, args[2]),
        });
      } else {
        generalPredicates.push(predicate);
      }
    } catch (error) {
      throw fail(error instanceof Error ? error.message : String(error), offset);
    }
  }

  return {
    textPredicates,
    generalPredicates,
    setProperties,
    propertySettings,
    assertedProperties,
    refutedProperties,
    captureOffsets,
  };
}

/** Whether a structurally complete match passes every text predicate */
export function satisfiesPredicates(
  predicates: readonly MatchPredicate[],
  match: QueryMatch,
  textOf: TextProvider
): boolean {
  return predicates.every((predicate) => predicate(match, textOf));
}

import {
  type Expression,
  type MatchOptions,
  type TextMatchOptions,
  type PredicateOptions,
  type UnitPredicate,
  Literal,
  RegexMatch,
  PredicateMatch,
  EndOfInput,
  Sequence,
  Alternation,
  Optional,
  Repetition,
  RuleReference,
  Required,
} from './Expression.js';
import type { InputUnit, Token } from './ParseState.js';

// ─── Primitives ────────────────────────────────────────────────────────────────

/** `'text'` */
export function literal(text: string, options?: TextMatchOptions): Literal {
  return new Literal(text, options);
}

/** A pattern anchored at the current position. */
export function regex(pattern: RegExp | string, options?: TextMatchOptions): RegexMatch {
  return new RegexMatch(pattern, options);
}

/** Consumes one unit (character or token) when `test` accepts it. */
export function predicate(test: UnitPredicate, options?: PredicateOptions): PredicateMatch {
  return new PredicateMatch(test, options);
}

function isToken(unit: InputUnit): unit is Token {
  return typeof unit !== 'string';
}

/** One token of the given kind. Never matches text input. */
export function kind(tokenKind: string, options?: MatchOptions): PredicateMatch {
  return new PredicateMatch(unit => isToken(unit) && unit.kind === tokenKind, {
    description: tokenKind,
    ...options,
  });
}

/** One token of any kind other than the given one. Never matches text input. */
export function notKind(tokenKind: string, options?: MatchOptions): PredicateMatch {
  return new PredicateMatch(unit => isToken(unit) && unit.kind !== tokenKind, {
    description: `not ${tokenKind}`,
    ...options,
  });
}

export function endOfInput(): EndOfInput {
  return new EndOfInput();
}

// ─── Combinators ───────────────────────────────────────────────────────────────

/** `a b c` */
export function sequence(...children: Expression[]): Sequence {
  return new Sequence(children);
}

/** `a | b | c`, first match wins. */
export function choice(...children: Expression[]): Alternation {
  return new Alternation(children);
}

/** `[a]` */
export function optional(child: Expression): Optional {
  return new Optional(child);
}

/** `{a}` when `min` is 0, otherwise at least `min` repetitions. */
export function repeat(child: Expression, min = 0): Repetition {
  return new Repetition(child, min);
}

export function oneOrMore(child: Expression): Repetition {
  return new Repetition(child, 1);
}

export function reference(name: string): RuleReference {
  return new RuleReference(name);
}

/** Fails the whole parse with `errorCode` when `child` does not match. */
export function required(child: Expression, errorCode: string): Required {
  return new Required(child, errorCode);
}

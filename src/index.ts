export { Grammar } from './Grammar.js';
export type { GrammarOptions, RuleOptions, Rule, FinalizeFunction } from './Grammar.js';

export {
  Expression,
  Primitive,
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
export type { MatchOptions, TextMatchOptions, PredicateOptions, UnitPredicate } from './Expression.js';

export {
  literal,
  regex,
  predicate,
  kind,
  notKind,
  endOfInput,
  sequence,
  choice,
  optional,
  repeat,
  oneOrMore,
  reference,
  required,
} from './Combinators.js';

export { ParseState, TextState, TokenState, createState } from './ParseState.js';
export type { Token, InputUnit, TextLocation, Checkpoint, UnitMatch } from './ParseState.js';

export { SyntaxTreeNode, TerminalNode, dump, isSyntaxTreeNode, isTerminalNode } from './SyntaxTreeNode.js';
export type { ParseTreeChild, DumpOptions } from './SyntaxTreeNode.js';

export { GrammarError, UndefinedRuleError, FatalParseError, RecursionLimitError } from './Errors.js';

export { parse } from './Parser.js';
export type { ParseOptions, ParseResult, TraceEvent } from './Parser.js';

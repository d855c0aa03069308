import type { Grammar, Rule } from './Grammar.js';
import {
  type Expression,
  type Primitive,
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
import {
  GrammarError,
  UndefinedRuleError,
  FatalParseError,
  RecursionLimitError,
} from './Errors.js';
import {
  ParseState,
  createState,
  type Checkpoint,
  type TextLocation,
  type Token,
  type UnitMatch,
} from './ParseState.js';
import { SyntaxTreeNode, TerminalNode } from './SyntaxTreeNode.js';

// ─── Public API ────────────────────────────────────────────────────────────────

export interface TraceEvent {
  type: 'enter' | 'success' | 'failure';
  rule: string;
  position: number;
  depth: number;
}

export interface ParseOptions {
  /** Rule to start from. Defaults to the grammar's start rule. */
  rule?: string;
  /** Fail unless the whole input is consumed. */
  complete?: boolean;
  /** Abort with a `RecursionLimitError` when rules nest deeper than this. */
  maxDepth?: number;
  /** Called on entry to and exit from every named rule. */
  trace?: (event: TraceEvent) => void;
}

export type ParseResult =
  | { ok: true; state: ParseState; tree: SyntaxTreeNode; position: number }
  | { ok: false; state: ParseState; position: number; expected: string[]; location: TextLocation };

/**
 * Run `grammar` on `input`. Ordinary failure is returned, never thrown; the
 * state is then exactly as it was before the call. Undefined rules, fatal
 * rules and the recursion limit throw a `GrammarError`.
 */
export function parse(
  grammar: Grammar,
  input: ParseState | string | readonly Token[],
  options?: ParseOptions,
): ParseResult {
  const ruleName = options?.rule ?? grammar.startRule;
  if (ruleName === null) {
    throw new GrammarError('Grammar has no rules. Define one or pass options.rule.');
  }
  const state = input instanceof ParseState ? input : createState(input);
  return new Evaluator(grammar, state, options ?? {}).run(ruleName);
}

// ─── Internal: Outcome ─────────────────────────────────────────────────────────

type Outcome =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'abort'; error: GrammarError };

const SUCCESS: Outcome = { kind: 'success' };
const FAILURE: Outcome = { kind: 'failure' };

function abort(error: GrammarError): Outcome {
  return { kind: 'abort', error };
}

// ─── Internal: Evaluator ───────────────────────────────────────────────────────

class Evaluator {
  private readonly grammar: Grammar;
  private readonly state: ParseState;
  private readonly options: ParseOptions;
  private readonly maxDepth: number;
  private depth = 0;

  // Error tracking
  private furthestPos = -1;
  private expectedAtFurthest: Set<string> = new Set();

  constructor(grammar: Grammar, state: ParseState, options: ParseOptions) {
    this.grammar = grammar;
    this.state = state;
    this.options = options;
    this.maxDepth = options.maxDepth ?? Infinity;
  }

  run(ruleName: string): ParseResult {
    const start = this.state.checkpoint();
    try {
      return this.runRule(ruleName, start);
    } catch (error) {
      // Thrown from a finalize, trace or predicate callback, or an abort.
      this.state.restore(start);
      throw error;
    }
  }

  private runRule(ruleName: string, start: Checkpoint): ParseResult {
    const outcome = this.evaluate(new RuleReference(ruleName));

    if (outcome.kind === 'abort') {
      throw outcome.error;
    }
    if (outcome.kind === 'failure') {
      return this.failure();
    }

    const tree = this.state.ast[this.state.ast.length - 1];
    if (!(tree instanceof SyntaxTreeNode)) {
      throw new GrammarError(`Rule '${ruleName}' did not produce a tree`);
    }

    if (this.options.complete) {
      const end = this.state.checkpoint();
      this.state.skip(this.grammar.skipPatterns);
      if (!this.state.atEnd) {
        this.expect(this.state.position, 'end of input');
        this.state.restore(start);
        return this.failure();
      }
      this.state.restore(end);
    }

    return { ok: true, state: this.state, tree, position: this.state.position };
  }

  private failure(): ParseResult {
    const position = this.furthestPos >= 0 ? this.furthestPos : this.state.position;
    return {
      ok: false,
      state: this.state,
      position,
      expected: [...this.expectedAtFurthest],
      location: this.state.location(position),
    };
  }

  // ─── Checkpoint / Restore ─────────────────────────────────────────────

  private evaluate(expression: Expression): Outcome {
    const checkpoint = this.state.checkpoint();
    const outcome = this.dispatch(expression);
    if (outcome.kind !== 'success') {
      this.state.restore(checkpoint);
    }
    return outcome;
  }

  private dispatch(expression: Expression): Outcome {
    if (expression instanceof Literal) {
      if (expression.skipWhitespace) this.state.skip(this.grammar.skipPatterns);
      return this.consume(expression, this.state.matchLiteral(expression.text));
    }
    if (expression instanceof RegexMatch) {
      if (expression.skipWhitespace) this.state.skip(this.grammar.skipPatterns);
      return this.consume(expression, this.state.matchRegex(expression.anchored));
    }
    if (expression instanceof PredicateMatch) {
      return this.consume(expression, this.state.matchPredicate(expression.test));
    }
    if (expression instanceof EndOfInput) {
      this.state.skip(this.grammar.skipPatterns);
      if (this.state.atEnd) return SUCCESS;
      this.expect(this.state.position, expression.describe());
      return FAILURE;
    }
    if (expression instanceof Sequence) {
      for (const child of expression.children) {
        const outcome = this.evaluate(child);
        if (outcome.kind !== 'success') return outcome;
      }
      return SUCCESS;
    }
    if (expression instanceof Alternation) {
      for (const child of expression.children) {
        const outcome = this.evaluate(child);
        if (outcome.kind !== 'failure') return outcome;
      }
      return FAILURE;
    }
    if (expression instanceof Optional) {
      const outcome = this.evaluate(expression.child);
      return outcome.kind === 'abort' ? outcome : SUCCESS;
    }
    if (expression instanceof Repetition) {
      return this.repeat(expression);
    }
    if (expression instanceof RuleReference) {
      return this.invoke(expression.name);
    }
    if (expression instanceof Required) {
      const outcome = this.evaluate(expression.child);
      if (outcome.kind !== 'failure') return outcome;
      return abort(new FatalParseError(expression.errorCode, this.state.location(this.state.position)));
    }
    return abort(new GrammarError(`Unsupported expression: ${expression.describe()}`));
  }

  // ─── Terminal Matching ────────────────────────────────────────────────

  private consume(expression: Primitive, match: UnitMatch | null): Outcome {
    const start = this.state.position;
    if (!match) {
      this.expect(start, expression.describe());
      return FAILURE;
    }
    if (expression.capture) {
      this.state.push(
        new TerminalNode(expression, expression.label, match.text, start, start + match.length, match.token),
      );
    }
    this.state.advance(match.length);
    return SUCCESS;
  }

  private expect(position: number, description: string): void {
    if (position > this.furthestPos) {
      this.furthestPos = position;
      this.expectedAtFurthest = new Set();
    }
    if (position === this.furthestPos) {
      this.expectedAtFurthest.add(description);
    }
  }

  // ─── Repetition ───────────────────────────────────────────────────────

  private repeat(expression: Repetition): Outcome {
    let count = 0;
    for (;;) {
      const before = this.state.position;
      const outcome = this.evaluate(expression.child);
      if (outcome.kind === 'abort') return outcome;
      if (outcome.kind === 'failure') break;
      count++;
      // A match that consumed nothing would repeat forever; the minimum is met.
      if (this.state.position === before) return SUCCESS;
    }
    return count >= expression.min ? SUCCESS : FAILURE;
  }

  // ─── Named Rules ──────────────────────────────────────────────────────

  private invoke(name: string): Outcome {
    const rule = this.grammar.rule(name);
    if (!rule) {
      return abort(new UndefinedRuleError(name, this.state.position));
    }
    if (this.depth >= this.maxDepth) {
      return abort(new RecursionLimitError(name, this.maxDepth));
    }

    const checkpoint = this.state.checkpoint();
    this.trace('enter', name, checkpoint.position);
    this.depth++;
    const outcome = this.evaluate(rule.expression);
    this.depth--;

    if (outcome.kind === 'success') {
      this.state.push(this.buildNode(rule, checkpoint.position, this.state.drain(checkpoint)));
      this.trace('success', name, this.state.position);
      return SUCCESS;
    }

    this.trace('failure', name, checkpoint.position);
    if (outcome.kind === 'failure' && rule.fatal) {
      return abort(new FatalParseError(rule.errorCode, this.state.location(checkpoint.position), name));
    }
    return outcome;
  }

  private buildNode(rule: Rule, position: number, children: (SyntaxTreeNode | TerminalNode)[]): SyntaxTreeNode {
    const first = children[0];
    const last = children[children.length - 1];
    const start = first ? first.start : position;
    const end = last ? last.end : this.state.position;
    const node = new SyntaxTreeNode(rule.name, rule.expression, start, end, children);
    const replaced = rule.finalize?.(node);
    return replaced instanceof SyntaxTreeNode ? replaced : node;
  }

  private trace(type: TraceEvent['type'], rule: string, position: number): void {
    this.options.trace?.({ type, rule, position, depth: this.depth });
  }
}

import {
  type Expression,
  Sequence,
  Alternation,
  Optional,
  Repetition,
  RuleReference,
  Required,
} from './Expression.js';
import { GrammarError, UndefinedRuleError } from './Errors.js';
import { parse, type ParseOptions, type ParseResult } from './Parser.js';
import type { ParseState, Token } from './ParseState.js';
import type { SyntaxTreeNode } from './SyntaxTreeNode.js';

export interface GrammarOptions {
  /** Skipped before every literal or regex match on text input. */
  whitespace?: RegExp | RegExp[];
  comments?: RegExp | RegExp[];
  /** Entry rule. Defaults to the first rule defined. */
  start?: string;
}

export type FinalizeFunction = (node: SyntaxTreeNode) => SyntaxTreeNode | void;

export interface RuleOptions {
  /** Failure of this rule aborts the parse with a `FatalParseError`. */
  fatal?: boolean;
  /** Code carried by the `FatalParseError`. Defaults to `'<name> expected'`. */
  errorCode?: string;
  /** Called with each node the rule produces; a returned node replaces it. */
  finalize?: FinalizeFunction;
}

export interface Rule {
  readonly name: string;
  readonly expression: Expression;
  readonly fatal: boolean;
  readonly errorCode: string;
  readonly finalize: FinalizeFunction | null;
}

export class Grammar {
  readonly options: GrammarOptions;
  /** Whitespace then comment patterns, compiled sticky. */
  readonly skipPatterns: readonly RegExp[];
  private readonly rules: Map<string, Rule> = new Map();

  constructor(options?: GrammarOptions) {
    this.options = options ?? {};
    this.skipPatterns = [
      ...toArray(this.options.whitespace),
      ...toArray(this.options.comments),
    ].map(p => new RegExp(p.source, p.flags.replace(/[gy]/g, '') + 'y'));
  }

  /**
   * Register `expression` under `name`. Redefining a name replaces its
   * expression and options but keeps its place in definition order.
   */
  define(name: string, expression: Expression, options?: RuleOptions): this {
    if (name.length === 0) {
      throw new GrammarError('Rule names must not be empty');
    }
    this.rules.set(name, {
      name,
      expression,
      fatal: options?.fatal ?? false,
      errorCode: options?.errorCode ?? `${name} expected`,
      finalize: options?.finalize ?? null,
    });
    return this;
  }

  /** A reference to `name`, which need not be defined yet. */
  reference(name: string): RuleReference {
    return new RuleReference(name);
  }

  get(name: string): Expression {
    const rule = this.rules.get(name);
    if (!rule) {
      throw new UndefinedRuleError(name);
    }
    return rule.expression;
  }

  rule(name: string): Rule | undefined {
    return this.rules.get(name);
  }

  has(name: string): boolean {
    return this.rules.has(name);
  }

  get ruleNames(): string[] {
    return [...this.rules.keys()];
  }

  get startRule(): string | null {
    if (this.options.start !== undefined) {
      return this.options.start;
    }
    const first = this.rules.keys().next();
    return first.done ? null : first.value;
  }

  /** Names referenced somewhere in the grammar but never defined, in first-seen order. */
  undefinedReferences(): string[] {
    const missing = new Set<string>();
    const visited = new Set<Expression>();
    const visit = (e: Expression): void => {
      if (visited.has(e)) return;
      visited.add(e);
      if (e instanceof RuleReference) {
        if (!this.rules.has(e.name)) missing.add(e.name);
      } else if (e instanceof Sequence || e instanceof Alternation) {
        e.children.forEach(visit);
      } else if (e instanceof Optional || e instanceof Repetition || e instanceof Required) {
        visit(e.child);
      }
    };
    for (const rule of this.rules.values()) {
      visit(rule.expression);
    }
    if (this.options.start !== undefined && !this.rules.has(this.options.start)) {
      missing.add(this.options.start);
    }
    return [...missing];
  }

  parse(input: ParseState | string | readonly Token[], options?: ParseOptions): ParseResult {
    return parse(this, input, options);
  }
}

function toArray(patterns: RegExp | RegExp[] | undefined): RegExp[] {
  if (!patterns) return [];
  return Array.isArray(patterns) ? patterns : [patterns];
}

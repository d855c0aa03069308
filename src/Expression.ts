import { GrammarError } from './Errors.js';
import type { InputUnit } from './ParseState.js';

export interface MatchOptions {
  /** Push the matched text into the tree as a terminal. Defaults to `true`. */
  capture?: boolean;
  /** Name given to the captured terminal. */
  name?: string;
}

export interface TextMatchOptions extends MatchOptions {
  /** Skip the grammar's whitespace and comments first. Defaults to `true`. */
  skipWhitespace?: boolean;
}

export interface PredicateOptions extends MatchOptions {
  /** Shown in failure reports in place of the predicate itself. */
  description?: string;
}

export type UnitPredicate = (unit: InputUnit) => boolean;

/** A node of a parsing expression. Expressions are immutable once constructed. */
export abstract class Expression {
  /** EBNF-like rendering, used in failure reports. */
  abstract describe(): string;

  toString(): string {
    return this.describe();
  }
}

/** A matcher over the input unit(s) at the current position. */
export abstract class Primitive extends Expression {
  readonly capture: boolean;
  readonly label: string;

  protected constructor(defaultLabel: string, options?: MatchOptions) {
    super();
    this.capture = options?.capture ?? true;
    this.label = options?.name ?? defaultLabel;
  }
}

export class Literal extends Primitive {
  readonly text: string;
  readonly skipWhitespace: boolean;

  constructor(text: string, options?: TextMatchOptions) {
    super('literal', options);
    this.text = text;
    this.skipWhitespace = options?.skipWhitespace ?? true;
  }

  describe(): string {
    return `'${this.text}'`;
  }
}

export class RegexMatch extends Primitive {
  readonly pattern: RegExp;
  /** Sticky copy of `pattern`, anchored at `lastIndex`. */
  readonly anchored: RegExp;
  readonly skipWhitespace: boolean;

  constructor(pattern: RegExp | string, options?: TextMatchOptions) {
    super('regex', options);
    this.skipWhitespace = options?.skipWhitespace ?? true;
    this.pattern = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    this.anchored = new RegExp(this.pattern.source, this.pattern.flags.replace(/[gy]/g, '') + 'y');
  }

  describe(): string {
    return `/${this.pattern.source}/`;
  }
}

export class PredicateMatch extends Primitive {
  readonly test: UnitPredicate;
  readonly description: string;

  constructor(test: UnitPredicate, options?: PredicateOptions) {
    super('token', options);
    this.test = test;
    this.description = options?.description ?? 'predicate';
  }

  describe(): string {
    return this.description;
  }
}

export class EndOfInput extends Expression {
  describe(): string {
    return 'end of input';
  }
}

export class Sequence extends Expression {
  readonly children: readonly Expression[];

  constructor(children: readonly Expression[]) {
    super();
    if (children.length === 0) {
      throw new GrammarError('A sequence needs at least one expression');
    }
    this.children = [...children];
  }

  describe(): string {
    return this.children
      .map(c => (c instanceof Alternation || c instanceof Sequence ? `(${c.describe()})` : c.describe()))
      .join(' ');
  }
}

export class Alternation extends Expression {
  readonly children: readonly Expression[];

  constructor(children: readonly Expression[]) {
    super();
    if (children.length === 0) {
      throw new GrammarError('A choice needs at least one alternative');
    }
    this.children = [...children];
  }

  describe(): string {
    return this.children
      .map(c => (c instanceof Alternation ? `(${c.describe()})` : c.describe()))
      .join(' | ');
  }
}

export class Optional extends Expression {
  readonly child: Expression;

  constructor(child: Expression) {
    super();
    this.child = child;
  }

  describe(): string {
    return `[${this.child.describe()}]`;
  }
}

export class Repetition extends Expression {
  readonly child: Expression;
  readonly min: number;

  constructor(child: Expression, min: number) {
    super();
    if (!Number.isInteger(min) || min < 0) {
      throw new GrammarError(`Repetition minimum must be a non-negative integer, got ${min}`);
    }
    this.child = child;
    this.min = min;
  }

  describe(): string {
    return this.min === 0 ? `{${this.child.describe()}}` : `{${this.child.describe()}}${this.min}+`;
  }
}

/** A use of a named rule. Only the name is held; the registry resolves it at parse time. */
export class RuleReference extends Expression {
  readonly name: string;

  constructor(name: string) {
    super();
    if (name.length === 0) {
      throw new GrammarError('Rule names must not be empty');
    }
    this.name = name;
  }

  describe(): string {
    return this.name;
  }
}

/** Turns an ordinary failure of `child` into a fatal one. */
export class Required extends Expression {
  readonly child: Expression;
  readonly errorCode: string;

  constructor(child: Expression, errorCode: string) {
    super();
    this.child = child;
    this.errorCode = errorCode;
  }

  describe(): string {
    return this.child.describe();
  }
}

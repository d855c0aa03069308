import type { TextLocation } from './ParseState.js';

/** Base class for every error the engine raises. Ordinary match failures are never thrown. */
export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GrammarError';
  }
}

export class UndefinedRuleError extends GrammarError {
  readonly rule: string;
  readonly position: number | null;

  constructor(rule: string, position: number | null = null) {
    super(
      position === null
        ? `Undefined rule '${rule}'`
        : `Undefined rule '${rule}' referenced at position ${position}`,
    );
    this.name = 'UndefinedRuleError';
    this.rule = rule;
    this.position = position;
  }
}

/**
 * Raised when an expression built with `required(...)`, or a rule defined with
 * `fatal: true`, fails to match. Aborts the whole parse.
 */
export class FatalParseError extends GrammarError {
  readonly errorCode: string;
  readonly position: number;
  readonly location: TextLocation;
  readonly rule: string | null;

  constructor(errorCode: string, location: TextLocation, rule: string | null = null) {
    super(`Line ${location.line}, column ${location.column}: ${errorCode}`);
    this.name = 'FatalParseError';
    this.errorCode = errorCode;
    this.position = location.index;
    this.location = location;
    this.rule = rule;
  }
}

export class RecursionLimitError extends GrammarError {
  readonly rule: string;
  readonly depth: number;

  constructor(rule: string, depth: number) {
    super(`Maximum rule nesting depth ${depth} exceeded while entering '${rule}'`);
    this.name = 'RecursionLimitError';
    this.rule = rule;
    this.depth = depth;
  }
}

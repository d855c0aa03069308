import type { ParseTreeChild } from './SyntaxTreeNode.js';

/** A pre-classified unit of input, e.g. one line of a document tagged with its block kind. */
export interface Token {
  kind: string;
  value: string;
}

/** What a predicate sees: one character of text input, or one token. */
export type InputUnit = string | Token;

export interface TextLocation {
  index: number;
  line: number;
  column: number;
}

export interface Checkpoint {
  readonly position: number;
  readonly astLength: number;
}

export interface UnitMatch {
  text: string;
  /** Units consumed: UTF-16 code units for text, always 1 for tokens. */
  length: number;
  token: Token | null;
}

/**
 * The mutable side of a parse: input, cursor and the accumulator of tree nodes
 * produced so far. One state belongs to one parse invocation at a time.
 */
export abstract class ParseState {
  private cursor = 0;
  private readonly stack: ParseTreeChild[] = [];

  get position(): number {
    return this.cursor;
  }

  get ast(): readonly ParseTreeChild[] {
    return this.stack;
  }

  /** Number of units in the input. */
  abstract get length(): number;

  get atEnd(): boolean {
    return this.cursor >= this.length;
  }

  get remaining(): number {
    return Math.max(0, this.length - this.cursor);
  }

  abstract current(): InputUnit | undefined;

  abstract matchLiteral(text: string): UnitMatch | null;

  /** `pattern` must be sticky; `^` anchors at the cursor. */
  abstract matchRegex(pattern: RegExp): UnitMatch | null;

  abstract location(position: number): TextLocation;

  matchPredicate(test: (unit: InputUnit) => boolean): UnitMatch | null {
    const unit = this.current();
    if (unit === undefined || !test(unit)) {
      return null;
    }
    return typeof unit === 'string'
      ? { text: unit, length: unit.length, token: null }
      : { text: unit.value, length: 1, token: unit };
  }

  /** Advance past any run of the given (sticky) patterns. No-op for token input. */
  skip(_patterns: readonly RegExp[]): void {}

  checkpoint(): Checkpoint {
    return { position: this.cursor, astLength: this.stack.length };
  }

  restore(checkpoint: Checkpoint): void {
    this.cursor = checkpoint.position;
    this.stack.length = checkpoint.astLength;
  }

  advance(length: number): void {
    this.cursor = Math.min(this.cursor + length, this.length);
  }

  push(node: ParseTreeChild): void {
    this.stack.push(node);
  }

  /** Remove and return everything pushed since `checkpoint`. */
  drain(checkpoint: Checkpoint): ParseTreeChild[] {
    return this.stack.splice(checkpoint.astLength);
  }
}

export class TextState extends ParseState {
  readonly input: string;

  constructor(input: string) {
    super();
    this.input = input;
  }

  get length(): number {
    return this.input.length;
  }

  /** The character at the cursor, a whole code point even outside the BMP. */
  current(): string | undefined {
    const code = this.input.codePointAt(this.position);
    return code === undefined ? undefined : String.fromCodePoint(code);
  }

  matchLiteral(text: string): UnitMatch | null {
    if (this.atEnd || !this.input.startsWith(text, this.position)) {
      return null;
    }
    return { text, length: text.length, token: null };
  }

  matchRegex(pattern: RegExp): UnitMatch | null {
    if (this.atEnd) {
      return null;
    }
    pattern.lastIndex = 0;
    const m = pattern.exec(this.input.slice(this.position));
    return m ? { text: m[0], length: m[0].length, token: null } : null;
  }

  override skip(patterns: readonly RegExp[]): void {
    let changed = patterns.length > 0;
    while (changed) {
      changed = false;
      for (const pat of patterns) {
        pat.lastIndex = this.position;
        const m = pat.exec(this.input);
        if (m && m[0].length > 0) {
          this.advance(m[0].length);
          changed = true;
        }
      }
    }
  }

  location(position: number): TextLocation {
    let line = 1;
    let column = 1;
    for (let i = 0; i < position && i < this.input.length; i++) {
      if (this.input[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return { index: position, line, column };
  }
}

export class TokenState extends ParseState {
  readonly input: readonly Token[];

  constructor(input: readonly Token[]) {
    super();
    this.input = input;
  }

  get length(): number {
    return this.input.length;
  }

  current(): Token | undefined {
    return this.input[this.position];
  }

  matchLiteral(text: string): UnitMatch | null {
    const token = this.current();
    if (token === undefined || !token.value.startsWith(text)) {
      return null;
    }
    return { text: token.value, length: 1, token };
  }

  matchRegex(pattern: RegExp): UnitMatch | null {
    const token = this.current();
    if (token === undefined) {
      return null;
    }
    pattern.lastIndex = 0;
    return pattern.test(token.value) ? { text: token.value, length: 1, token } : null;
  }

  /** Each token counts as one line. */
  location(position: number): TextLocation {
    return { index: position, line: position + 1, column: 1 };
  }
}

export function createState(input: string | readonly Token[]): ParseState {
  return typeof input === 'string' ? new TextState(input) : new TokenState(input);
}

import { describe, it, expect } from 'vitest';
import {
  Grammar,
  RuleReference,
  Literal,
  GrammarError,
  UndefinedRuleError,
  literal,
  regex,
  sequence,
  choice,
  optional,
  repeat,
  required,
} from '../src/index.js';

describe('Grammar', () => {
  it('creates a grammar with options', () => {
    const g = new Grammar({ whitespace: /\s+/, comments: /#.*$/m, start: 'doc' });
    expect(g.options.whitespace).toEqual(/\s+/);
    expect(g.options.start).toBe('doc');
    expect(g.skipPatterns.map(p => p.flags)).toEqual(['y', 'my']);
    expect(g.skipPatterns.map(p => p.source)).toEqual(['\\s+', '#.*$']);
  });

  it('creates a grammar with no options', () => {
    const g = new Grammar();
    expect(g.options).toEqual({});
    expect(g.skipPatterns).toEqual([]);
    expect(g.startRule).toBeNull();
    expect(g.ruleNames).toEqual([]);
  });

  it('accepts arrays of whitespace and comment patterns', () => {
    const g = new Grammar({ whitespace: [/ +/, /\\\n/g], comments: [/#.*/, /\/\*.*?\*\//] });
    expect(g.skipPatterns).toHaveLength(4);
    expect(g.skipPatterns[1].flags).toBe('y');
  });
});

describe('Rule registry', () => {
  it('registers and looks up rules', () => {
    const g = new Grammar();
    const number = regex(/[0-9]+/);
    expect(g.define('number', number)).toBe(g);
    expect(g.has('number')).toBe(true);
    expect(g.get('number')).toBe(number);
    expect(g.rule('number')).toEqual({
      name: 'number',
      expression: number,
      fatal: false,
      errorCode: 'number expected',
      finalize: null,
    });
  });

  it('throws for unknown rule names', () => {
    const g = new Grammar();
    expect(g.rule('nope')).toBeUndefined();
    expect(() => g.get('nope')).toThrow(UndefinedRuleError);
    expect(() => g.get('nope')).toThrow("Undefined rule 'nope'");
  });

  it('rejects empty rule names', () => {
    expect(() => new Grammar().define('', literal('a'))).toThrow(GrammarError);
    expect(() => new Grammar().reference('')).toThrow(GrammarError);
  });

  it('overwrites a redefined rule but keeps its position', () => {
    const g = new Grammar();
    g.define('a', literal('a'));
    g.define('b', literal('b'));
    const replacement = literal('A');
    g.define('a', replacement, { fatal: true, errorCode: 'A missing' });
    expect(g.ruleNames).toEqual(['a', 'b']);
    expect(g.startRule).toBe('a');
    expect(g.get('a')).toBe(replacement);
    expect(g.rule('a')?.fatal).toBe(true);
    expect(g.rule('a')?.errorCode).toBe('A missing');
  });

  it('uses the explicit start rule when given', () => {
    const g = new Grammar({ start: 'b' });
    g.define('a', literal('a'));
    g.define('b', literal('b'));
    expect(g.startRule).toBe('b');
    expect(g.parse('b').ok).toBe(true);
    expect(g.parse('a').ok).toBe(false);
  });

  it('creates references by name without resolving them', () => {
    const g = new Grammar();
    const ref = g.reference('later');
    expect(ref).toBeInstanceOf(RuleReference);
    expect(ref.name).toBe('later');
    expect(g.has('later')).toBe(false);
  });

  it('lists references to rules that were never defined', () => {
    const g = new Grammar({ start: 'main' });
    g.define('list', sequence(g.reference('item'), repeat(sequence(literal(','), g.reference('item')))));
    g.define('item', choice(g.reference('atom'), g.reference('list'), optional(g.reference('tail'))));
    g.define('atom', required(g.reference('word'), 'word expected'));
    expect(g.undefinedReferences()).toEqual(['tail', 'word', 'main']);

    g.define('word', regex(/\w+/));
    g.define('tail', literal('...'));
    g.define('main', g.reference('list'));
    expect(g.undefinedReferences()).toEqual([]);
  });

  it('does not coerce strings into matchers', () => {
    const g = new Grammar();
    g.define('a', literal('a'));
    expect(g.get('a')).toBeInstanceOf(Literal);
  });
});

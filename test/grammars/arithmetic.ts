import {
  Grammar,
  SyntaxTreeNode,
  isSyntaxTreeNode,
  literal,
  regex,
  sequence,
  choice,
  optional,
  repeat,
  required,
} from '../../src/index.js';

/**
 * expr    = term {addOp term}
 * term    = factor {mulOp factor}
 * factor  = number ['^' factor] | bracket
 * bracket = '(' expr ')'
 */
export function arithmeticGrammar(): Grammar {
  const g = new Grammar({ whitespace: / +/ });
  g.define('expr', sequence(g.reference('term'), repeat(sequence(g.reference('addOp'), g.reference('term')))));
  g.define('addOp', choice(literal('+'), literal('-')));
  g.define('term', sequence(g.reference('factor'), repeat(sequence(g.reference('mulOp'), g.reference('factor')))));
  g.define('mulOp', choice(literal('*'), literal('/')));
  g.define(
    'factor',
    choice(
      sequence(g.reference('number'), optional(sequence(literal('^'), g.reference('factor')))),
      g.reference('bracket'),
    ),
  );
  g.define('number', regex(/[0-9]+/));
  g.define('bracket', sequence(literal('('), g.reference('expr'), required(literal(')'), "')' expected")));
  return g;
}

function nodeAt(node: SyntaxTreeNode, index: number): SyntaxTreeNode {
  const c = node.child(index);
  if (!isSyntaxTreeNode(c)) {
    throw new Error(`Expected a node at ${node.name}[${index}]`);
  }
  return c;
}

export function evaluate(node: SyntaxTreeNode): number {
  switch (node.name) {
    case 'expr':
    case 'term': {
      let value = evaluate(nodeAt(node, 0));
      for (let i = 1; i < node.length; i += 2) {
        const op = nodeAt(node, i).text;
        const rhs = evaluate(nodeAt(node, i + 1));
        if (op === '+') value += rhs;
        else if (op === '-') value -= rhs;
        else if (op === '*') value *= rhs;
        else value /= rhs;
      }
      return value;
    }
    case 'factor': {
      const base = evaluate(nodeAt(node, 0));
      return node.length === 3 ? base ** evaluate(nodeAt(node, 2)) : base;
    }
    case 'bracket':
      return evaluate(nodeAt(node, 1));
    case 'number':
      return Number(node.text);
    default:
      throw new Error(`Unexpected node '${node.name}'`);
  }
}

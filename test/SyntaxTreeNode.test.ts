import { describe, it, expect } from 'vitest';
import {
  SyntaxTreeNode,
  TerminalNode,
  dump,
  isSyntaxTreeNode,
  isTerminalNode,
  regex,
} from '../src/index.js';

const word = regex(/\w+/);

function leaf(text: string, start: number): TerminalNode {
  return new TerminalNode(word, 'regex', text, start, start + text.length);
}

// call(f, args(x, y))
function sampleTree(): SyntaxTreeNode {
  const args = new SyntaxTreeNode('args', word, 2, 6, [leaf('x', 2), leaf(',', 3), leaf('y', 5)]);
  return new SyntaxTreeNode('call', word, 0, 7, [leaf('f', 0), args, leaf(')', 6)]);
}

describe('SyntaxTreeNode', () => {
  it('exposes its children', () => {
    const tree = sampleTree();
    expect(tree.length).toBe(3);
    expect(tree.child(0)).toMatchObject({ text: 'f' });
    expect(tree.child(1)).toMatchObject({ name: 'args' });
  });

  it('throws for children out of range', () => {
    expect(() => sampleTree().child(3)).toThrow(RangeError);
    expect(() => sampleTree().child(-1)).toThrow("Child index -1 out of range for 'call' with 3 children");
  });

  it('cannot be modified through its children array', () => {
    const tree = sampleTree();
    expect(Object.isFrozen(tree.children)).toBe(true);
  });

  it('collects terminals depth-first', () => {
    const tree = sampleTree();
    expect(tree.terminals().map(t => t.text)).toEqual(['f', 'x', ',', 'y', ')']);
    expect(tree.text).toBe('fx,y)');
  });

  it('finds descendants by name', () => {
    const tree = sampleTree();
    expect(tree.find('args')?.start).toBe(2);
    expect(tree.find('missing')).toBeNull();
  });

  it('has type guards', () => {
    const tree = sampleTree();
    expect(isSyntaxTreeNode(tree)).toBe(true);
    expect(isTerminalNode(tree)).toBe(false);
    expect(isTerminalNode(tree.child(0))).toBe(true);
    expect(isSyntaxTreeNode({ name: 'fake', children: [] })).toBe(false);
  });
});

describe('dump', () => {
  it('renders nodes with indented children and quoted terminals', () => {
    expect(dump(sampleTree())).toBe(
      ['call:', '  "f"', '  args:', '    "x"', '    ","', '    "y"', '  ")"'].join('\n'),
    );
  });

  it('uses the given indent width', () => {
    const tree = new SyntaxTreeNode('a', word, 0, 1, [new SyntaxTreeNode('b', word, 0, 1, [leaf('z', 0)])]);
    expect(dump(tree, { indent: 4 })).toBe('a:\n    b:\n        "z"');
  });

  it('escapes quotes in terminal text', () => {
    expect(dump(leaf('say "hi"', 0))).toBe('"say \\"hi\\""');
  });

  it('renders an empty node as its name alone', () => {
    expect(dump(new SyntaxTreeNode('empty', word, 4, 4))).toBe('empty:');
  });
});

import type { Expression } from './Expression.js';
import type { Token } from './ParseState.js';

export type ParseTreeChild = SyntaxTreeNode | TerminalNode;

/** Text (or token) consumed by a primitive. */
export class TerminalNode {
  readonly name: string;
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly token: Token | null;
  readonly expression: Expression;

  constructor(expression: Expression, name: string, text: string, start: number, end: number, token: Token | null = null) {
    this.expression = expression;
    this.name = name;
    this.text = text;
    this.start = start;
    this.end = end;
    this.token = token;
  }
}

/** One successful match of a named rule. */
export class SyntaxTreeNode {
  readonly name: string;
  readonly children: readonly ParseTreeChild[];
  readonly start: number;
  readonly end: number;
  readonly expression: Expression;

  constructor(name: string, expression: Expression, start: number, end: number, children: readonly ParseTreeChild[] = []) {
    this.name = name;
    this.expression = expression;
    this.start = start;
    this.end = end;
    this.children = Object.freeze([...children]);
  }

  get length(): number {
    return this.children.length;
  }

  child(index: number): ParseTreeChild {
    if (index < 0 || index >= this.children.length) {
      throw new RangeError(`Child index ${index} out of range for '${this.name}' with ${this.children.length} children`);
    }
    return this.children[index];
  }

  /** Terminals below this node, depth-first. */
  terminals(): TerminalNode[] {
    const out: TerminalNode[] = [];
    for (const c of this.children) {
      if (c instanceof TerminalNode) {
        out.push(c);
      } else {
        out.push(...c.terminals());
      }
    }
    return out;
  }

  get text(): string {
    return this.terminals().map(t => t.text).join('');
  }

  /** First descendant node with the given name, depth-first. */
  find(name: string): SyntaxTreeNode | null {
    for (const c of this.children) {
      if (c instanceof SyntaxTreeNode) {
        if (c.name === name) return c;
        const found = c.find(name);
        if (found) return found;
      }
    }
    return null;
  }
}

export function isSyntaxTreeNode(value: unknown): value is SyntaxTreeNode {
  return value instanceof SyntaxTreeNode;
}

export function isTerminalNode(value: unknown): value is TerminalNode {
  return value instanceof TerminalNode;
}

export interface DumpOptions {
  /** Spaces per nesting level. Defaults to 2. */
  indent?: number;
}

/**
 * Render a tree depth-first: `name:` for each node with its children one level
 * deeper, and each terminal as its quoted text.
 */
export function dump(node: ParseTreeChild, options?: DumpOptions): string {
  const indent = options?.indent ?? 2;
  const lines: string[] = [];
  const visit = (n: ParseTreeChild, level: number): void => {
    const pad = ' '.repeat(level * indent);
    if (n instanceof TerminalNode) {
      lines.push(pad + JSON.stringify(n.text));
      return;
    }
    lines.push(`${pad}${n.name}:`);
    for (const c of n.children) {
      visit(c, level + 1);
    }
  };
  visit(node, 0);
  return lines.join('\n');
}

import type { ClauseBlock, ClauseItem, ClauseNode, ClauseScalar } from './clause-parser.js';

export const clauseScalar = (value: string | number, quoted = false): ClauseScalar => ({
  kind: 'scalar',
  text: String(value),
  quoted,
  line: 0,
});

export const clauseYesNo = (value: boolean): ClauseScalar => clauseScalar(value ? 'yes' : 'no');

export const clauseList = (values: readonly (string | number)[]): ClauseBlock => ({
  kind: 'block',
  items: values.map((value) => ({ kind: 'element', value: clauseScalar(value), line: 0 })),
  line: 0,
});

export class ClauseBlockBuilder {
  private readonly items: ClauseItem[] = [];

  field(key: string, value: ClauseNode): this {
    this.items.push({ kind: 'field', key, operator: '=', value, line: 0 });
    return this;
  }

  scalar(key: string, value: string | number): this {
    return this.field(key, clauseScalar(value));
  }

  quoted(key: string, value: string): this {
    return this.field(key, clauseScalar(value, true));
  }

  yesNo(key: string, value: boolean): this {
    return this.field(key, clauseYesNo(value));
  }

  list(key: string, values: readonly (string | number)[]): this {
    return this.field(key, clauseList(values));
  }

  element(value: ClauseNode): this {
    this.items.push({ kind: 'element', value, line: 0 });
    return this;
  }

  build(): ClauseBlock {
    return { kind: 'block', items: [...this.items], line: 0 };
  }
}

const quote = (text: string): string => `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

function formatScalar(scalar: ClauseScalar): string {
  return scalar.quoted ? quote(scalar.text) : scalar.text;
}

function formatNode(node: ClauseNode, depth: number): string {
  if (node.kind === 'scalar') {
    return formatScalar(node);
  }
  const tag = node.tag === undefined ? '' : `${node.tag} `;
  if (node.items.length === 0) {
    return `${tag}{ }`;
  }
  const inline = node.items.every((item) => item.kind === 'element' && item.value.kind === 'scalar');
  if (inline) {
    return `${tag}{ ${node.items.map((item) => formatNode(item.value, depth + 1)).join(' ')} }`;
  }
  const indent = '\t'.repeat(depth);
  return `${tag}{\n${formatItems(node.items, depth + 1)}${indent}}`;
}

function formatItems(items: readonly ClauseItem[], depth: number): string {
  const indent = '\t'.repeat(depth);
  return items
    .map((item) =>
      item.kind === 'field'
        ? `${indent}${item.key} ${item.operator} ${formatNode(item.value, depth)}\n`
        : `${indent}${formatNode(item.value, depth)}\n`,
    )
    .join('');
}

/** Formats a document block as clause text that parses back to the same fields. */
export function formatClauseDocument(document: ClauseBlock): string {
  return formatItems(document.items, 0);
}

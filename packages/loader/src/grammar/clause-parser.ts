import { MapLoadError, withFileLocation } from '../kernel/map-load-error.js';
import { tokenizeClauseText } from './clause-tokenizer.js';
import type { ClauseOperator, ClauseToken } from './clause-tokenizer.js';
import { readLegacyText } from './source-files.js';

export interface ClauseScalar {
  readonly kind: 'scalar';
  readonly text: string;
  readonly quoted: boolean;
  readonly line: number;
}

export interface ClauseBlock {
  readonly kind: 'block';
  readonly items: readonly ClauseItem[];
  /** Set for tagged blocks such as `rgb { 1 2 3 }`. */
  readonly tag?: string;
  readonly line: number;
}

export type ClauseNode = ClauseScalar | ClauseBlock;

export interface ClauseField {
  readonly kind: 'field';
  readonly key: string;
  readonly operator: ClauseOperator;
  readonly value: ClauseNode;
  readonly line: number;
}

export interface ClauseElement {
  readonly kind: 'element';
  readonly value: ClauseNode;
  readonly line: number;
}

export type ClauseItem = ClauseField | ClauseElement;

export const CLAUSE_BLOCK_TAGS: ReadonlySet<string> = new Set(['rgb', 'hsv', 'hsv360', 'hex']);

class ClauseParser {
  private index = 0;

  constructor(private readonly tokens: readonly ClauseToken[]) {}

  parseDocument(): ClauseBlock {
    const items = this.parseItems(undefined);
    return { kind: 'block', items, line: 1 };
  }

  private peek(): ClauseToken | undefined {
    return this.tokens[this.index];
  }

  private next(): ClauseToken | undefined {
    const token = this.tokens[this.index];
    this.index += 1;
    return token;
  }

  /** `openedAt` is undefined for the document itself, which has no closing brace. */
  private parseItems(openedAt: number | undefined): readonly ClauseItem[] {
    const items: ClauseItem[] = [];
    for (;;) {
      const token = this.peek();
      if (token === undefined) {
        if (openedAt !== undefined) {
          throw syntaxError(`Block is never closed.`, openedAt);
        }
        return items;
      }
      switch (token.kind) {
        case 'close':
          this.next();
          if (openedAt === undefined) {
            throw syntaxError(`Unexpected "}".`, token.line);
          }
          return items;
        case 'operator':
          throw syntaxError(`Unexpected operator "${token.operator}".`, token.line);
        case 'open': {
          if (openedAt === undefined) {
            throw syntaxError(`Expected a key at the top level.`, token.line);
          }
          items.push({ kind: 'element', value: this.parseBlock(), line: token.line });
          break;
        }
        case 'scalar': {
          this.next();
          const following = this.peek();
          if (following?.kind === 'operator') {
            this.next();
            items.push({
              kind: 'field',
              key: token.text,
              operator: following.operator,
              value: this.parseValue(token.text, following.line),
              line: token.line,
            });
          } else {
            if (openedAt === undefined) {
              throw syntaxError(`Expected "=" after "${token.text}".`, token.line);
            }
            items.push({ kind: 'element', value: scalarNode(token), line: token.line });
          }
          break;
        }
      }
    }
  }

  private parseValue(key: string, operatorLine: number): ClauseNode {
    const token = this.peek();
    if (token === undefined) {
      throw syntaxError(`Missing value for "${key}".`, operatorLine);
    }
    switch (token.kind) {
      case 'open':
        return this.parseBlock();
      case 'scalar': {
        this.next();
        if (!token.quoted && CLAUSE_BLOCK_TAGS.has(token.text) && this.peek()?.kind === 'open') {
          return { ...this.parseBlock(), tag: token.text };
        }
        return scalarNode(token);
      }
      case 'close':
      case 'operator':
        throw syntaxError(`Missing value for "${key}".`, token.line);
    }
  }

  private parseBlock(): ClauseBlock {
    const open = this.next();
    const line = open?.line ?? 1;
    const items = this.parseItems(line);
    return { kind: 'block', items, line };
  }
}

function scalarNode(token: { readonly text: string; readonly quoted: boolean; readonly line: number }): ClauseScalar {
  return { kind: 'scalar', text: token.text, quoted: token.quoted, line: token.line };
}

function syntaxError(message: string, line: number): MapLoadError {
  return new MapLoadError('CLAUSE_SYNTAX_INVALID', message, { line });
}

/** Parses clause text. The document is an implicit block of `key = value` fields. */
export function parseClauseDocument(text: string): ClauseBlock {
  return new ClauseParser(tokenizeClauseText(text)).parseDocument();
}

export function loadClauseDocument(path: string): ClauseBlock {
  const text = readLegacyText(path);
  try {
    return parseClauseDocument(text);
  } catch (error) {
    throw withFileLocation(error, path);
  }
}

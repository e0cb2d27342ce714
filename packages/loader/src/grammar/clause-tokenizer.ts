import { MapLoadError } from '../kernel/map-load-error.js';

export type ClauseOperator = '=' | '==' | '!=' | '<' | '>' | '<=' | '>=' | '?=';

export type ClauseToken =
  | { readonly kind: 'open'; readonly line: number }
  | { readonly kind: 'close'; readonly line: number }
  | { readonly kind: 'operator'; readonly operator: ClauseOperator; readonly line: number }
  | { readonly kind: 'scalar'; readonly text: string; readonly quoted: boolean; readonly line: number };

const isWhitespace = (char: string): boolean =>
  char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v';

const STRUCTURAL_CHARS = new Set(['{', '}', '=', '<', '>', '!', '#', '"']);

function syntaxError(message: string, line: number): MapLoadError {
  return new MapLoadError('CLAUSE_SYNTAX_INVALID', message, { line });
}

export function tokenizeClauseText(text: string): readonly ClauseToken[] {
  const tokens: ClauseToken[] = [];
  let index = 0;
  let line = 1;

  const charAt = (offset: number): string => text.charAt(index + offset);

  while (index < text.length) {
    const char = charAt(0);

    if (char === '\n') {
      line += 1;
      index += 1;
      continue;
    }
    if (isWhitespace(char)) {
      index += 1;
      continue;
    }
    if (char === '#') {
      while (index < text.length && charAt(0) !== '\n') {
        index += 1;
      }
      continue;
    }
    if (char === '{') {
      tokens.push({ kind: 'open', line });
      index += 1;
      continue;
    }
    if (char === '}') {
      tokens.push({ kind: 'close', line });
      index += 1;
      continue;
    }

    const operator = readOperator(char, charAt(1));
    if (operator !== undefined) {
      tokens.push({ kind: 'operator', operator, line });
      index += operator.length;
      continue;
    }
    if (char === '!') {
      throw syntaxError(`Expected "=" after "!".`, line);
    }

    if (char === '"') {
      const startLine = line;
      let value = '';
      index += 1;
      let closed = false;
      while (index < text.length) {
        const current = charAt(0);
        if (current === '"') {
          closed = true;
          index += 1;
          break;
        }
        if (current === '\\' && (charAt(1) === '"' || charAt(1) === '\\')) {
          value += charAt(1);
          index += 2;
          continue;
        }
        if (current === '\n') {
          line += 1;
        }
        value += current;
        index += 1;
      }
      if (!closed) {
        throw syntaxError(`Unterminated quoted string.`, startLine);
      }
      tokens.push({ kind: 'scalar', text: value, quoted: true, line: startLine });
      continue;
    }

    const start = index;
    while (index < text.length) {
      const current = charAt(0);
      if (isWhitespace(current) || STRUCTURAL_CHARS.has(current) || (current === '?' && charAt(1) === '=')) {
        break;
      }
      index += 1;
    }
    tokens.push({ kind: 'scalar', text: text.slice(start, index), quoted: false, line });
  }

  return tokens;
}

function readOperator(char: string, next: string): ClauseOperator | undefined {
  switch (char) {
    case '=':
      return next === '=' ? '==' : '=';
    case '<':
      return next === '=' ? '<=' : '<';
    case '>':
      return next === '=' ? '>=' : '>';
    case '!':
      return next === '=' ? '!=' : undefined;
    case '?':
      return next === '=' ? '?=' : undefined;
    default:
      return undefined;
  }
}

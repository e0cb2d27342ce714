import { MapLoadError, withFileLocation } from '../kernel/map-load-error.js';
import { loadClauseDocument } from './clause-parser.js';
import type { ClauseBlock, ClauseField, ClauseNode, ClauseScalar } from './clause-parser.js';

/** Decodes one clause node; `path` names the node in error messages (`strategic_region.weather.period[0]`). */
export type ClauseDecoder<T> = (node: ClauseNode, path: string) => T;

export function clauseDecodeError(message: string, line: number): MapLoadError {
  return new MapLoadError('CLAUSE_DECODE_FAILED', message, { line });
}

export function expectScalar(node: ClauseNode, path: string): ClauseScalar {
  if (node.kind !== 'scalar') {
    throw clauseDecodeError(`${path}: expected a value, found a block.`, node.line);
  }
  return node;
}

export function expectBlock(node: ClauseNode, path: string): ClauseBlock {
  if (node.kind !== 'block') {
    throw clauseDecodeError(`${path}: expected a block, found "${node.text}".`, node.line);
  }
  return node;
}

/** Lifts a text parser into a decoder; parse failures keep their code and gain the path and line. */
export function scalarDecoder<T>(parse: (text: string) => T): ClauseDecoder<T> {
  return (node, path) => {
    const scalar = expectScalar(node, path);
    try {
      return parse(scalar.text);
    } catch (error) {
      if (error instanceof MapLoadError) {
        throw new MapLoadError(
          error.code,
          `${path}: ${error.message}`,
          { ...error.context, line: scalar.line },
          { cause: error },
        );
      }
      throw error;
    }
  };
}

export const decodeString: ClauseDecoder<string> = scalarDecoder((text) => text);

export function listOf<T>(decodeItem: ClauseDecoder<T>): ClauseDecoder<readonly T[]> {
  return (node, path) => {
    const block = expectBlock(node, path);
    return block.items.map((item, index) => {
      if (item.kind === 'field') {
        throw clauseDecodeError(`${path}: expected a list, found key "${item.key}".`, item.line);
      }
      return decodeItem(item.value, `${path}[${index}]`);
    });
  };
}

export function fixedListOf<T>(decodeItem: ClauseDecoder<T>, length: number): ClauseDecoder<readonly T[]> {
  const decodeList = listOf(decodeItem);
  return (node, path) => {
    const values = decodeList(node, path);
    if (values.length !== length) {
      throw clauseDecodeError(`${path}: expected ${length} values, found ${values.length}.`, node.line);
    }
    return values;
  };
}

/**
 * Field access for one block. `required` and `optional` read the last
 * occurrence of a key; `duplicated` reads every occurrence in order. Keys the
 * caller never asks for are ignored.
 */
export class ClauseFieldReader {
  constructor(
    readonly block: ClauseBlock,
    readonly path: string,
  ) {}

  fields(key: string): readonly ClauseField[] {
    return this.block.items.filter((item): item is ClauseField => item.kind === 'field' && item.key === key);
  }

  keys(): readonly string[] {
    return this.block.items.filter((item): item is ClauseField => item.kind === 'field').map((field) => field.key);
  }

  required<T>(key: string, decode: ClauseDecoder<T>): T {
    const field = this.fields(key).at(-1);
    if (field === undefined) {
      const prefix = this.path === '' ? '' : `${this.path}: `;
      throw clauseDecodeError(`${prefix}missing required key "${key}".`, this.block.line);
    }
    return decode(field.value, this.childPath(key));
  }

  optional<T>(key: string, decode: ClauseDecoder<T>): T | undefined {
    const field = this.fields(key).at(-1);
    return field === undefined ? undefined : decode(field.value, this.childPath(key));
  }

  duplicated<T>(key: string, decode: ClauseDecoder<T>): readonly T[] {
    return this.fields(key).map((field, index) => decode(field.value, `${this.childPath(key)}[${index}]`));
  }

  private childPath(key: string): string {
    return this.path === '' ? key : `${this.path}.${key}`;
  }
}

export function objectDecoder<T>(build: (fields: ClauseFieldReader) => T): ClauseDecoder<T> {
  return (node, path) => build(new ClauseFieldReader(expectBlock(node, path), path));
}

/** Reads, parses and decodes one clause file. */
export function loadClauseFile<T>(path: string, decode: (document: ClauseFieldReader) => T): T {
  const document = loadClauseDocument(path);
  try {
    return decode(new ClauseFieldReader(document, ''));
  } catch (error) {
    throw withFileLocation(error, path);
  }
}

import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { reportDiagnostic } from '../kernel/diagnostics.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { describeError, MapLoadError, withFileLocation } from '../kernel/map-load-error.js';
import { readUtf8Text, splitSourceLines } from './source-files.js';

export const DELIMITED_FIELD_SEPARATOR = ';';

/**
 * `strict` aborts the file on the first row that fails to decode; `loose`
 * skips that row and reports a warning.
 */
export type DelimitedLoadMode = 'strict' | 'loose';

/** Position is used when the file has no header; `name` otherwise. */
export interface DelimitedColumn {
  readonly name: string;
  readonly index: number;
}

export interface DelimitedRecord {
  readonly line: number;
  readonly fields: readonly string[];
  cell(column: DelimitedColumn): string | undefined;
}

export interface DelimitedReadOptions<T> {
  readonly header: boolean;
  readonly mode: DelimitedLoadMode;
  readonly decode: (record: DelimitedRecord) => T;
  /** A record for which this returns true ends the file; it and every later line are ignored. */
  readonly isTerminator?: (record: DelimitedRecord) => boolean;
}

export const normalizeColumnName = (name: string): string => name.trim().toLowerCase().replace(/_/g, '');

export function splitDelimitedLine(text: string, separator = DELIMITED_FIELD_SEPARATOR): readonly string[] {
  const fields: string[] = [];
  let current = '';
  let index = 0;
  let quoted = false;

  while (index < text.length) {
    const char = text.charAt(index);
    if (quoted) {
      if (char === '"') {
        if (text.charAt(index + 1) === '"') {
          current += '"';
          index += 2;
          continue;
        }
        quoted = false;
        index += 1;
        continue;
      }
      current += char;
      index += 1;
      continue;
    }
    if (char === '"' && current === '') {
      quoted = true;
    } else if (char === separator) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
    index += 1;
  }

  if (quoted) {
    throw new MapLoadError('DELIMITED_SYNTAX_INVALID', 'Unterminated quoted field.');
  }
  fields.push(current);
  return fields;
}

function createRecord(
  line: number,
  fields: readonly string[],
  columnsByName: ReadonlyMap<string, number> | undefined,
): DelimitedRecord {
  return {
    line,
    fields,
    cell(column: DelimitedColumn): string | undefined {
      const index = columnsByName === undefined ? column.index : columnsByName.get(normalizeColumnName(column.name));
      return index === undefined ? undefined : fields[index];
    },
  };
}

function recordError(record: DelimitedRecord, column: DelimitedColumn, message: string, cause?: unknown): MapLoadError {
  return new MapLoadError(
    'RECORD_DECODE_FAILED',
    `Column "${column.name}": ${message}`,
    { line: record.line },
    cause === undefined ? {} : { cause },
  );
}

function parseCell<T>(record: DelimitedRecord, column: DelimitedColumn, text: string, parse: (text: string) => T): T {
  try {
    return parse(text);
  } catch (error) {
    if (error instanceof MapLoadError) {
      throw recordError(record, column, describeError(error), error);
    }
    throw error;
  }
}

export function requiredCell<T>(record: DelimitedRecord, column: DelimitedColumn, parse: (text: string) => T): T {
  const text = record.cell(column);
  if (text === undefined) {
    throw recordError(record, column, 'missing value.');
  }
  return parseCell(record, column, text, parse);
}

/** Missing or empty cells are absent; so is any value `isUnset` accepts. */
export function optionalCell<T>(
  record: DelimitedRecord,
  column: DelimitedColumn,
  parse: (text: string) => T,
  isUnset: (value: T) => boolean = () => false,
): T | undefined {
  const text = record.cell(column);
  if (text === undefined || text === '') {
    return undefined;
  }
  const value = parseCell(record, column, text, parse);
  return isUnset(value) ? undefined : value;
}

export function readDelimitedRecords<T>(path: string, options: DelimitedReadOptions<T>, context: LoadContext = {}): readonly T[] {
  const lines = splitSourceLines(readUtf8Text(path)).filter((line) => line.text.trim() !== '');
  const values: T[] = [];
  let columnsByName: ReadonlyMap<string, number> | undefined;
  let rows = lines;

  if (options.header) {
    const [headerLine, ...rest] = lines;
    rows = rest;
    const names = headerLine === undefined ? [] : splitHeader(path, headerLine.text, headerLine.number);
    columnsByName = new Map(names.map((name, index) => [normalizeColumnName(name), index]));
  }

  for (const line of rows) {
    try {
      const record = createRecord(line.number, splitDelimitedLine(line.text), columnsByName);
      if (options.isTerminator?.(record) === true) {
        break;
      }
      values.push(options.decode(record));
    } catch (error) {
      if (!(error instanceof MapLoadError) || options.mode === 'strict') {
        throw withFileLocation(error, path, line.number);
      }
      reportDiagnostic(context, {
        code: MAP_DIAGNOSTIC_CODES.DELIMITED_ROW_SKIPPED,
        path: `row[${line.number}]`,
        severity: 'warning',
        message: `Skipped row: ${error.message}`,
        filePath: path,
        line: line.number,
      });
    }
  }

  return values;
}

function splitHeader(path: string, text: string, line: number): readonly string[] {
  try {
    return splitDelimitedLine(text);
  } catch (error) {
    throw withFileLocation(error, path, line);
  }
}

import { readdirSync, readFileSync } from 'node:fs';

import { describeError, MapLoadError } from '../kernel/map-load-error.js';

export interface SourceLine {
  /** One-based. */
  readonly number: number;
  readonly text: string;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

function ioError(path: string, error: unknown): MapLoadError {
  const code = errnoCode(error) === 'ENOENT' ? 'FILE_NOT_FOUND' : 'FILE_READ_FAILED';
  return new MapLoadError(code, `Failed to read ${path}: ${describeError(error)}`, { filePath: path }, { cause: error });
}

export function readSourceBytes(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw ioError(path, error);
  }
}

function stripUtf8Bom(bytes: Buffer): Buffer {
  return bytes[0] === UTF8_BOM[0] && bytes[1] === UTF8_BOM[1] && bytes[2] === UTF8_BOM[2] ? bytes.subarray(3) : bytes;
}

/** Reads clause-format text: every byte maps to the code point of the same value. */
export function readLegacyText(path: string): string {
  return stripUtf8Bom(readSourceBytes(path)).toString('latin1');
}

/** Reads delimited-record text, which must be valid UTF-8. */
export function readUtf8Text(path: string): string {
  const bytes = stripUtf8Bom(readSourceBytes(path));
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new MapLoadError(
      'FILE_READ_FAILED',
      `Failed to decode ${path} as UTF-8: ${describeError(error)}`,
      { filePath: path },
      { cause: error },
    );
  }
}

/** Regular files of a directory, sorted by name. */
export function listDirectoryFiles(directory: string): readonly string[] {
  try {
    return readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort((left, right) => left.localeCompare(right));
  } catch (error) {
    throw ioError(directory, error);
  }
}

export function splitSourceLines(text: string): readonly SourceLine[] {
  return text.split('\n').map((line, index) => ({
    number: index + 1,
    text: line.endsWith('\r') ? line.slice(0, -1) : line,
  }));
}

/** Lines that hold anything besides whitespace. */
export function contentLines(text: string): readonly SourceLine[] {
  return splitSourceLines(text).filter((line) => line.text.trim() !== '');
}

export function whitespaceTokens(text: string): readonly string[] {
  return text.split(/\s+/).filter((token) => token !== '');
}

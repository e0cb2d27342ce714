import type { ProvinceId, RailLevel } from '../kernel/branded.js';
import { MapLoadError, withFileLocation } from '../kernel/map-load-error.js';
import { parseProvinceId, parseRailLevel, parseUSize } from '../kernel/scalars.js';
import { contentLines, readUtf8Text, whitespaceTokens } from '../grammar/source-files.js';

export const MIN_RAIL_LEVEL = 1;
export const MAX_RAIL_LEVEL = 5;

export interface Railway {
  readonly level: RailLevel;
  /** Declared province count; always equal to `provinces.length`. */
  readonly length: number;
  readonly provinces: readonly ProvinceId[];
}

function invalidRailway(line: string, reason: string): MapLoadError {
  return new MapLoadError('RAILWAY_LINE_INVALID', `Invalid railway "${line}": ${reason}.`);
}

function tryParseProvinceId(token: string): ProvinceId | undefined {
  try {
    return parseProvinceId(token);
  } catch (error) {
    if (error instanceof MapLoadError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * `<level> <count> <province>...`. Tokens that are not province ids are
 * dropped before the count is checked. A level outside
 * `MIN_RAIL_LEVEL..MAX_RAIL_LEVEL` rejects the line, and `loadRailways` then
 * rejects the whole file.
 */
export function parseRailwayLine(line: string): Railway {
  const [levelText, lengthText, ...provinceTokens] = whitespaceTokens(line);
  if (levelText === undefined || lengthText === undefined) {
    throw invalidRailway(line, 'expected a level and a province count');
  }
  const level = parseRailLevel(levelText);
  if (level < MIN_RAIL_LEVEL || level > MAX_RAIL_LEVEL) {
    throw invalidRailway(line, `level must be between ${MIN_RAIL_LEVEL} and ${MAX_RAIL_LEVEL}`);
  }
  const length = parseUSize(lengthText, 'railway length');
  const provinces = provinceTokens
    .map(tryParseProvinceId)
    .filter((province): province is ProvinceId => province !== undefined);
  if (provinces.length !== length) {
    throw invalidRailway(line, `declares ${length} provinces but lists ${provinces.length}`);
  }
  return { level, length, provinces };
}

export function loadRailways(path: string): readonly Railway[] {
  return contentLines(readUtf8Text(path)).map((line) => {
    try {
      return parseRailwayLine(line.text);
    } catch (error) {
      throw withFileLocation(error, path, line.number);
    }
  });
}

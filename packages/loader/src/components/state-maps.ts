import type { ProvinceId, StateId } from '../kernel/branded.js';
import { describeError, MapLoadError } from '../kernel/map-load-error.js';
import { parseStateId } from '../kernel/scalars.js';
import { listOf } from '../grammar/clause-decoder.js';
import { parseClauseDocument } from '../grammar/clause-parser.js';
import { decodeProvinceId } from '../grammar/scalar-decoders.js';
import { contentLines, readLegacyText } from '../grammar/source-files.js';

/** State id to the ordered provinces listed for it. */
export type StateProvinceMap = ReadonlyMap<StateId, readonly ProvinceId[]>;

export type Airports = StateProvinceMap;
export type RocketSites = StateProvinceMap;

export interface StateProvinceEntry {
  readonly stateId: StateId;
  readonly provinces: readonly ProvinceId[];
}

const decodeProvinceList = listOf(decodeProvinceId);

/** Parses one `<state> = { <province>... }` line; a line may hold several entries. */
export function parseStateMapLine(line: string): readonly StateProvinceEntry[] {
  return parseClauseDocument(line).items.map((item) => {
    if (item.kind !== 'field') {
      throw new MapLoadError('CLAUSE_DECODE_FAILED', 'Expected <state id> = { <province ids> }.');
    }
    return {
      stateId: parseStateId(item.key),
      provinces: decodeProvinceList(item.value, item.key),
    };
  });
}

/** The last line naming a state wins. */
export function loadStateProvinceMap(path: string): StateProvinceMap {
  const entries = new Map<StateId, readonly ProvinceId[]>();
  for (const line of contentLines(readLegacyText(path))) {
    let parsed: readonly StateProvinceEntry[];
    try {
      parsed = parseStateMapLine(line.text);
    } catch (error) {
      throw new MapLoadError(
        'STATE_MAP_LINE_INVALID',
        `${path}:${line.number}: invalid state province line: ${describeError(error)}`,
        { filePath: path, line: line.number },
        { cause: error },
      );
    }
    for (const entry of parsed) {
      entries.set(entry.stateId, entry.provinces);
    }
  }
  return entries;
}

export const loadAirports = (path: string): Airports => loadStateProvinceMap(path);

export const loadRocketSites = (path: string): RocketSites => loadStateProvinceMap(path);

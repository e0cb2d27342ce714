import { z } from 'zod';

import type { Blue, ContinentIndex, Green, ProvinceId, Red, Terrain } from '../kernel/branded.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import {
  parseBlue,
  parseContinentIndex,
  parseDelimitedBoolean,
  parseGreen,
  parseProvinceId,
  parseRed,
  parseScalarText,
  parseTerrain,
} from '../kernel/scalars.js';
import type { Color } from '../kernel/scalars.js';
import { readDelimitedRecords, requiredCell } from '../grammar/delimited-records.js';
import type { DelimitedRecord } from '../grammar/delimited-records.js';

export const PROVINCE_TYPES = ['land', 'sea', 'lake'] as const;

export type ProvinceType = (typeof PROVINCE_TYPES)[number];

const ProvinceTypeSchema = z.string().pipe(
  z.enum(PROVINCE_TYPES, { errorMap: () => ({ message: `expected one of ${PROVINCE_TYPES.join(', ')}` }) }),
);

export const parseProvinceType = (text: string): ProvinceType =>
  parseScalarText(ProvinceTypeSchema, text, 'province type');

/** One row of `definition.csv`: `id;r;g;b;type;coastal;terrain;continent`. */
export interface Definition {
  readonly id: ProvinceId;
  readonly r: Red;
  readonly g: Green;
  readonly b: Blue;
  readonly provinceType: ProvinceType;
  readonly coastal: boolean;
  readonly terrain: Terrain;
  /** One-based index into the continent list; 0 for none. */
  readonly continent: ContinentIndex;
}

const DEFINITION_COLUMNS = {
  id: { name: 'id', index: 0 },
  r: { name: 'r', index: 1 },
  g: { name: 'g', index: 2 },
  b: { name: 'b', index: 3 },
  provinceType: { name: 'type', index: 4 },
  coastal: { name: 'coastal', index: 5 },
  terrain: { name: 'terrain', index: 6 },
  continent: { name: 'continent', index: 7 },
} as const;

export function decodeDefinitionRecord(record: DelimitedRecord): Definition {
  return {
    id: requiredCell(record, DEFINITION_COLUMNS.id, parseProvinceId),
    r: requiredCell(record, DEFINITION_COLUMNS.r, parseRed),
    g: requiredCell(record, DEFINITION_COLUMNS.g, parseGreen),
    b: requiredCell(record, DEFINITION_COLUMNS.b, parseBlue),
    provinceType: requiredCell(record, DEFINITION_COLUMNS.provinceType, parseProvinceType),
    coastal: requiredCell(record, DEFINITION_COLUMNS.coastal, parseDelimitedBoolean),
    terrain: requiredCell(record, DEFINITION_COLUMNS.terrain, parseTerrain),
    continent: requiredCell(record, DEFINITION_COLUMNS.continent, parseContinentIndex),
  };
}

export const definitionColor = (definition: Definition): Color => ({
  r: definition.r,
  g: definition.g,
  b: definition.b,
});

export function loadDefinitions(path: string, context: LoadContext = {}): readonly Definition[] {
  return readDelimitedRecords(path, { header: false, mode: 'strict', decode: decodeDefinitionRecord }, context);
}

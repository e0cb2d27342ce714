import { z } from 'zod';

import type { AdjacencyRuleName, ProvinceId, XCoord, YCoord } from '../kernel/branded.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import {
  parseAdjacencyRuleName,
  parseProvinceId,
  parseScalarText,
  parseXCoord,
  parseYCoord,
} from '../kernel/scalars.js';
import { optionalCell, readDelimitedRecords, requiredCell } from '../grammar/delimited-records.js';
import type { DelimitedRecord } from '../grammar/delimited-records.js';

export const ADJACENCY_TYPES = ['impassable', 'sea', 'river', 'large_river'] as const;

export type AdjacencyType = (typeof ADJACENCY_TYPES)[number];

const AdjacencyTypeSchema = z.string().pipe(
  z.enum(ADJACENCY_TYPES, { errorMap: () => ({ message: `expected one of ${ADJACENCY_TYPES.join(', ')}` }) }),
);

export const parseAdjacencyType = (text: string): AdjacencyType =>
  parseScalarText(AdjacencyTypeSchema, text, 'adjacency type');

/** Numeric cells holding this value are unset. */
export const ADJACENCY_UNSET_SENTINEL = -1;

export interface Adjacency {
  readonly from: ProvinceId;
  readonly to: ProvinceId;
  readonly adjacencyType?: AdjacencyType;
  /** Province that must be controlled for the crossing to be usable. */
  readonly through?: ProvinceId;
  readonly startX?: XCoord;
  readonly stopX?: XCoord;
  readonly startY?: YCoord;
  readonly stopY?: YCoord;
  readonly ruleName?: AdjacencyRuleName;
  readonly comment?: string;
}

const ADJACENCY_COLUMNS = {
  from: { name: 'From', index: 0 },
  to: { name: 'To', index: 1 },
  adjacencyType: { name: 'Type', index: 2 },
  through: { name: 'Through', index: 3 },
  startX: { name: 'start_x', index: 4 },
  stopX: { name: 'stop_x', index: 5 },
  startY: { name: 'start_y', index: 6 },
  stopY: { name: 'stop_y', index: 7 },
  ruleName: { name: 'adjacency_rule_name', index: 8 },
  comment: { name: 'comment', index: 9 },
} as const;

const isUnset = (value: number): boolean => value === ADJACENCY_UNSET_SENTINEL;

export function decodeAdjacencyRecord(record: DelimitedRecord): Adjacency {
  const adjacencyType = optionalCell(record, ADJACENCY_COLUMNS.adjacencyType, parseAdjacencyType);
  const through = optionalCell(record, ADJACENCY_COLUMNS.through, parseProvinceId, isUnset);
  const startX = optionalCell(record, ADJACENCY_COLUMNS.startX, parseXCoord, isUnset);
  const stopX = optionalCell(record, ADJACENCY_COLUMNS.stopX, parseXCoord, isUnset);
  const startY = optionalCell(record, ADJACENCY_COLUMNS.startY, parseYCoord, isUnset);
  const stopY = optionalCell(record, ADJACENCY_COLUMNS.stopY, parseYCoord, isUnset);
  const ruleName = optionalCell(record, ADJACENCY_COLUMNS.ruleName, parseAdjacencyRuleName);
  const comment = optionalCell(record, ADJACENCY_COLUMNS.comment, (text) => text);
  return {
    from: requiredCell(record, ADJACENCY_COLUMNS.from, parseProvinceId),
    to: requiredCell(record, ADJACENCY_COLUMNS.to, parseProvinceId),
    ...(adjacencyType === undefined ? {} : { adjacencyType }),
    ...(through === undefined ? {} : { through }),
    ...(startX === undefined ? {} : { startX }),
    ...(stopX === undefined ? {} : { stopX }),
    ...(startY === undefined ? {} : { startY }),
    ...(stopY === undefined ? {} : { stopY }),
    ...(ruleName === undefined ? {} : { ruleName }),
    ...(comment === undefined ? {} : { comment }),
  };
}

/** The file ends at the first row whose `From` cell is a negative integer. */
export function isAdjacencyTerminator(record: DelimitedRecord): boolean {
  const from = record.cell(ADJACENCY_COLUMNS.from);
  return from !== undefined && /^-\d+$/.test(from.trim());
}

export function loadAdjacencies(path: string, context: LoadContext = {}): readonly Adjacency[] {
  return readDelimitedRecords(
    path,
    { header: true, mode: 'strict', decode: decodeAdjacencyRecord, isTerminator: isAdjacencyTerminator },
    context,
  );
}

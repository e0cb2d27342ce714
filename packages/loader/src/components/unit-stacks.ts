import type { ModelIndex, ProvinceId } from '../kernel/branded.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { parseFiniteFloat, parseModelIndex, parseProvinceId } from '../kernel/scalars.js';
import { readDelimitedRecords, requiredCell } from '../grammar/delimited-records.js';
import type { DelimitedRecord } from '../grammar/delimited-records.js';

/** Placement of a unit model on the map. */
export interface UnitStack {
  readonly province: ProvinceId;
  readonly modelIndex: ModelIndex;
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly rotation: number;
  readonly scale: number;
}

const UNIT_STACK_COLUMNS = {
  province: { name: 'province', index: 0 },
  modelIndex: { name: 'model_index', index: 1 },
  x: { name: 'x', index: 2 },
  y: { name: 'y', index: 3 },
  z: { name: 'z', index: 4 },
  rotation: { name: 'rotation', index: 5 },
  scale: { name: 'scale', index: 6 },
} as const;

export function decodeUnitStackRecord(record: DelimitedRecord): UnitStack {
  return {
    province: requiredCell(record, UNIT_STACK_COLUMNS.province, parseProvinceId),
    modelIndex: requiredCell(record, UNIT_STACK_COLUMNS.modelIndex, parseModelIndex),
    x: requiredCell(record, UNIT_STACK_COLUMNS.x, parseFiniteFloat),
    y: requiredCell(record, UNIT_STACK_COLUMNS.y, parseFiniteFloat),
    z: requiredCell(record, UNIT_STACK_COLUMNS.z, parseFiniteFloat),
    rotation: requiredCell(record, UNIT_STACK_COLUMNS.rotation, parseFiniteFloat),
    scale: requiredCell(record, UNIT_STACK_COLUMNS.scale, parseFiniteFloat),
  };
}

export function loadUnitStacks(path: string, context: LoadContext = {}): readonly UnitStack[] {
  return readDelimitedRecords(path, { header: false, mode: 'loose', decode: decodeUnitStackRecord }, context);
}

import { join } from 'node:path';

import type {
  BuildingsMaxLevelFactor,
  CountryTag,
  LocalSupplies,
  Manpower,
  ProvinceId,
  StateCategoryName,
  StateId,
  StateName,
  VictoryPoints,
} from '../kernel/branded.js';
import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { reportDiagnostic } from '../kernel/diagnostics.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { clauseDecodeError, listOf, loadClauseFile, objectDecoder } from '../grammar/clause-decoder.js';
import type { ClauseDecoder, ClauseFieldReader } from '../grammar/clause-decoder.js';
import {
  decodeBuildingsMaxLevelFactor,
  decodeCountryTag,
  decodeLocalSupplies,
  decodeManpower,
  decodeProvinceId,
  decodeStateCategoryName,
  decodeStateId,
  decodeStateName,
  decodeVictoryPoints,
  decodeYesNo,
} from '../grammar/scalar-decoders.js';
import { listDirectoryFiles } from '../grammar/source-files.js';

export interface VictoryPointEntry {
  readonly province: ProvinceId;
  readonly points: VictoryPoints;
}

export interface StateHistory {
  readonly owner: CountryTag;
  readonly controller?: CountryTag;
  readonly victoryPoints: readonly VictoryPointEntry[];
}

export interface State {
  readonly id: StateId;
  readonly name: StateName;
  /** Every `manpower` entry in file order; the last one is in effect. */
  readonly manpower: readonly Manpower[];
  readonly stateCategory: readonly StateCategoryName[];
  readonly history?: StateHistory;
  readonly provinces: ReadonlySet<ProvinceId>;
  readonly localSupplies?: LocalSupplies;
  readonly impassable?: boolean;
  readonly buildingsMaxLevelFactor?: BuildingsMaxLevelFactor;
}

export type States = ReadonlyMap<StateId, State>;

/** `victory_points = { <province> <points> }` */
const decodeVictoryPointEntry: ClauseDecoder<VictoryPointEntry> = (node, path) => {
  const block = listOf((value) => value)(node, path);
  const [province, points] = block;
  if (province === undefined || points === undefined || block.length !== 2) {
    throw clauseDecodeError(`${path}: expected a province and its victory points.`, node.line);
  }
  return {
    province: decodeProvinceId(province, `${path}[0]`),
    points: decodeVictoryPoints(points, `${path}[1]`),
  };
};

export const decodeStateHistory: ClauseDecoder<StateHistory> = objectDecoder((fields) => {
  const controller = fields.optional('controller', decodeCountryTag);
  return {
    owner: fields.required('owner', decodeCountryTag),
    ...(controller === undefined ? {} : { controller }),
    victoryPoints: fields.duplicated('victory_points', decodeVictoryPointEntry),
  };
});

export const decodeState: ClauseDecoder<State> = objectDecoder((fields) => {
  const history = fields.optional('history', decodeStateHistory);
  const localSupplies = fields.optional('local_supplies', decodeLocalSupplies);
  const impassable = fields.optional('impassable', decodeYesNo);
  const buildingsMaxLevelFactor = fields.optional('buildings_max_level_factor', decodeBuildingsMaxLevelFactor);
  return {
    id: fields.required('id', decodeStateId),
    name: fields.required('name', decodeStateName),
    manpower: fields.duplicated('manpower', decodeManpower),
    stateCategory: fields.duplicated('state_category', decodeStateCategoryName),
    ...(history === undefined ? {} : { history }),
    provinces: new Set(fields.required('provinces', listOf(decodeProvinceId))),
    ...(localSupplies === undefined ? {} : { localSupplies }),
    ...(impassable === undefined ? {} : { impassable }),
    ...(buildingsMaxLevelFactor === undefined ? {} : { buildingsMaxLevelFactor }),
  };
});

export const decodeStateDocument = (document: ClauseFieldReader): State => document.required('state', decodeState);

export function loadState(path: string): State {
  return loadClauseFile(path, decodeStateDocument);
}

/** Every state file of a directory, in name order; a later file with the same id wins. */
export function loadStates(directory: string, context: LoadContext = {}): States {
  const states = new Map<StateId, State>();
  for (const fileName of listDirectoryFiles(directory)) {
    const filePath = join(directory, fileName);
    const state = loadState(filePath);
    if (states.has(state.id)) {
      reportDiagnostic(context, {
        code: MAP_DIAGNOSTIC_CODES.STATE_DUPLICATE,
        path: `states.${state.id}`,
        severity: 'warning',
        message: `State ${state.id} is declared by more than one file; ${fileName} is used.`,
        filePath,
        entityId: String(state.id),
      });
    }
    states.set(state.id, state);
  }
  return states;
}

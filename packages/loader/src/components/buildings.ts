import { asBuildingId, asProvinceId } from '../kernel/branded.js';
import type { BuildingId, ProvinceId, StateId } from '../kernel/branded.js';
import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { reportDiagnostic } from '../kernel/diagnostics.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { parseBuildingId, parseFiniteFloat, parseProvinceId, parseStateId } from '../kernel/scalars.js';
import { optionalCell, readDelimitedRecords, requiredCell } from '../grammar/delimited-records.js';
import type { DelimitedRecord } from '../grammar/delimited-records.js';
import { loadKeyCatalog } from './key-catalog.js';

/** Accepted even when the types file does not declare it. */
export const FLOATING_HARBOR_BUILDING = asBuildingId('floating_harbor');

const NO_ADJACENT_SEA = asProvinceId(0);

export interface StateBuilding {
  readonly stateId: StateId;
  readonly buildingId: BuildingId;
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly rotation: number;
  /** 0 when the building does not face the sea. */
  readonly adjacentSeaProvince: ProvinceId;
}

export interface Buildings {
  readonly types: ReadonlySet<BuildingId>;
  readonly buildings: readonly StateBuilding[];
}

const BUILDING_COLUMNS = {
  stateId: { name: 'state', index: 0 },
  buildingId: { name: 'building', index: 1 },
  x: { name: 'x', index: 2 },
  y: { name: 'y', index: 3 },
  z: { name: 'z', index: 4 },
  rotation: { name: 'rotation', index: 5 },
  adjacentSeaProvince: { name: 'adjacent_sea', index: 6 },
} as const;

export function decodeStateBuildingRecord(record: DelimitedRecord): StateBuilding {
  return {
    stateId: requiredCell(record, BUILDING_COLUMNS.stateId, parseStateId),
    buildingId: requiredCell(record, BUILDING_COLUMNS.buildingId, parseBuildingId),
    x: requiredCell(record, BUILDING_COLUMNS.x, parseFiniteFloat),
    y: requiredCell(record, BUILDING_COLUMNS.y, parseFiniteFloat),
    z: requiredCell(record, BUILDING_COLUMNS.z, parseFiniteFloat),
    rotation: requiredCell(record, BUILDING_COLUMNS.rotation, parseFiniteFloat),
    adjacentSeaProvince:
      optionalCell(record, BUILDING_COLUMNS.adjacentSeaProvince, parseProvinceId) ?? NO_ADJACENT_SEA,
  };
}

export function loadBuildingTypes(path: string): ReadonlySet<BuildingId> {
  const types = new Set(loadKeyCatalog(path, 'building type').map(asBuildingId));
  types.add(FLOATING_HARBOR_BUILDING);
  return types;
}

export function loadStateBuildings(path: string, context: LoadContext = {}): readonly StateBuilding[] {
  return readDelimitedRecords(path, { header: false, mode: 'loose', decode: decodeStateBuildingRecord }, context);
}

/** Drops every building whose type is not declared, reporting each one. */
export function filterDeclaredBuildings(
  types: ReadonlySet<BuildingId>,
  buildings: readonly StateBuilding[],
  context: LoadContext = {},
  filePath?: string,
): readonly StateBuilding[] {
  return buildings.filter((building, index) => {
    if (types.has(building.buildingId)) {
      return true;
    }
    reportDiagnostic(context, {
      code: MAP_DIAGNOSTIC_CODES.BUILDING_TYPE_UNDECLARED,
      path: `buildings[${index}].buildingId`,
      severity: 'warning',
      message: `Building type "${building.buildingId}" is not declared; the building in state ${building.stateId} is dropped.`,
      entityId: building.buildingId,
      ...(filePath === undefined ? {} : { filePath }),
    });
    return false;
  });
}

export function loadBuildings(typesPath: string, buildingsPath: string, context: LoadContext = {}): Buildings {
  const types = loadBuildingTypes(typesPath);
  const buildings = filterDeclaredBuildings(types, loadStateBuildings(buildingsPath, context), context, buildingsPath);
  return { types, buildings };
}

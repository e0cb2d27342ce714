import { z } from 'zod';

import { MapLoadError } from '../kernel/map-load-error.js';
import { AssetPathTextSchema } from '../kernel/scalars.js';

/**
 * Where the assets the manifest does not name are found. `manifest`,
 * `terrainTypes`, `buildingTypes` and `states` are relative to the game root;
 * every other entry is relative to the manifest's directory.
 */
export interface MapLayout {
  readonly manifest: string;
  readonly terrainTypes: string;
  readonly buildingTypes: string;
  readonly states: string;
  readonly strategicRegions: string;
  readonly supplyNodes: string;
  readonly railways: string;
  readonly airports: string;
  readonly rocketSites: string;
  readonly buildings: string;
  readonly cities: string;
  readonly colors: string;
  readonly unitStacks: string;
  readonly weatherPositions: string;
}

export const DEFAULT_MAP_LAYOUT: MapLayout = Object.freeze({
  manifest: 'map/default.map',
  terrainTypes: 'common/terrain/00_terrain.txt',
  buildingTypes: 'common/buildings/00_buildings.txt',
  states: 'history/states',
  strategicRegions: 'strategicregions',
  supplyNodes: 'supply_nodes.txt',
  railways: 'railways.txt',
  airports: 'airports.txt',
  rocketSites: 'rocketsites.txt',
  buildings: 'buildings.txt',
  cities: 'cities.txt',
  colors: 'colors.txt',
  unitStacks: 'unitstacks.txt',
  weatherPositions: 'weatherpositions.txt',
});

const LayoutPathSchema = AssetPathTextSchema.refine(
  (path) => !path.split('/').includes('..'),
  'expected a path without ".." segments',
);

const MapLayoutSchema = z
  .object({
    manifest: LayoutPathSchema,
    terrainTypes: LayoutPathSchema,
    buildingTypes: LayoutPathSchema,
    states: LayoutPathSchema,
    strategicRegions: LayoutPathSchema,
    supplyNodes: LayoutPathSchema,
    railways: LayoutPathSchema,
    airports: LayoutPathSchema,
    rocketSites: LayoutPathSchema,
    buildings: LayoutPathSchema,
    cities: LayoutPathSchema,
    colors: LayoutPathSchema,
    unitStacks: LayoutPathSchema,
    weatherPositions: LayoutPathSchema,
  })
  .strict();

/** Merges overrides onto the default layout and validates the result. */
export function resolveMapLayout(overrides: Partial<MapLayout> = {}): MapLayout {
  const result = MapLayoutSchema.safeParse({ ...DEFAULT_MAP_LAYOUT, ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'layout'}: ${issue.message}`);
    throw new MapLoadError('LAYOUT_INVALID', `Invalid map layout: ${issues.join('; ')}.`);
  }
  return result.data;
}

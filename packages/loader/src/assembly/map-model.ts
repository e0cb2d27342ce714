import type { BuildingId, ContinentName, ProvinceId, Terrain, TreeIndex } from '../kernel/branded.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import type { Color } from '../kernel/scalars.js';
import type { Adjacency } from '../components/adjacencies.js';
import type { AdjacencyRules } from '../components/adjacency-rules.js';
import type { StateBuilding } from '../components/buildings.js';
import type { Cities } from '../components/cities.js';
import type { Definition } from '../components/definitions.js';
import type { Railway } from '../components/railways.js';
import type { Seasons } from '../components/seasons.js';
import type { Airports, RocketSites } from '../components/state-maps.js';
import type { States } from '../components/states.js';
import type { StrategicRegions } from '../components/strategic-regions.js';
import type { UnitStack } from '../components/unit-stacks.js';
import type { WeatherPosition } from '../components/weather-positions.js';
import type { DefaultMap } from '../manifest/default-map.js';
import type { RgbRaster } from './raster.js';

export interface MapRasters {
  readonly provinces: RgbRaster;
  readonly terrain: RgbRaster;
  readonly rivers: RgbRaster;
  readonly heightmap: RgbRaster;
  readonly trees: RgbRaster;
}

/** Everything read from one game root. Nothing in it changes after `loadMap` returns. */
export interface MapModel {
  readonly rootPath: string;
  readonly manifestPath: string;
  readonly manifest: DefaultMap;
  readonly terrainTypes: ReadonlySet<Terrain>;
  readonly definitions: readonly Definition[];
  readonly continents: readonly ContinentName[];
  readonly adjacencyRules: AdjacencyRules;
  readonly adjacencies: readonly Adjacency[];
  readonly seasons: Seasons;
  readonly treeIndices: readonly TreeIndex[];
  readonly strategicRegions: StrategicRegions;
  readonly supplyNodes: ReadonlySet<ProvinceId>;
  readonly railways: readonly Railway[];
  readonly airports: Airports;
  readonly rocketSites: RocketSites;
  readonly buildingTypes: ReadonlySet<BuildingId>;
  readonly buildings: readonly StateBuilding[];
  readonly states: States;
  readonly cities: Cities;
  readonly colors: readonly Color[];
  readonly unitStacks: readonly UnitStack[];
  readonly weatherPositions: readonly WeatherPosition[];
  readonly rasters: MapRasters;
}

export interface LoadedMap {
  readonly map: MapModel;
  readonly diagnostics: readonly Diagnostic[];
}

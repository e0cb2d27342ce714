import { join } from 'node:path';

import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { createDiagnosticCollector } from '../kernel/diagnostics.js';
import type { DiagnosticSink, LoadContext } from '../kernel/diagnostics.js';
import { describeError, MapLoadError } from '../kernel/map-load-error.js';
import { loadAdjacencies } from '../components/adjacencies.js';
import { loadAdjacencyRules } from '../components/adjacency-rules.js';
import { loadBuildings } from '../components/buildings.js';
import { loadCities } from '../components/cities.js';
import { loadColors } from '../components/colors.js';
import { loadContinents } from '../components/continents.js';
import { loadDefinitions } from '../components/definitions.js';
import { loadTerrainTypes } from '../components/key-catalog.js';
import { loadRailways } from '../components/railways.js';
import { loadSeasons } from '../components/seasons.js';
import { loadAirports, loadRocketSites } from '../components/state-maps.js';
import { loadStates } from '../components/states.js';
import { loadStrategicRegions } from '../components/strategic-regions.js';
import { loadSupplyNodes } from '../components/supply-nodes.js';
import { loadUnitStacks } from '../components/unit-stacks.js';
import { loadWeatherPositions } from '../components/weather-positions.js';
import { loadDefaultMap, resolveManifestPath } from '../manifest/default-map.js';
import { crossValidateMap } from './cross-validate.js';
import { resolveMapLayout } from './map-layout.js';
import type { MapLayout } from './map-layout.js';
import type { LoadedMap, MapModel, MapRasters } from './map-model.js';
import { decodeRaster } from './raster.js';
import type { RasterDecoder } from './raster.js';

export interface MapLoadOptions {
  readonly rasterDecoder: RasterDecoder;
  /** Overrides for `DEFAULT_MAP_LAYOUT`. */
  readonly layout?: Partial<MapLayout>;
  /** Receives every diagnostic as soon as it is reported. */
  readonly diagnostics?: DiagnosticSink;
}

/** Steps of `loadMap`, in the order they run. */
export const MAP_SUB_LOADS = [
  'manifest',
  'terrainTypes',
  'definitions',
  'continents',
  'adjacencyRules',
  'adjacencies',
  'seasons',
  'strategicRegions',
  'supplyNodes',
  'railways',
  'airports',
  'rocketSites',
  'buildings',
  'states',
  'cities',
  'colors',
  'unitStacks',
  'weatherPositions',
  'rasters.provinces',
  'rasters.terrain',
  'rasters.rivers',
  'rasters.heightmap',
  'rasters.trees',
] as const;

export type MapSubLoad = (typeof MAP_SUB_LOADS)[number];

const toNativePath = (root: string, relativePath: string): string => join(root, ...relativePath.split('/'));

function describeSize(value: unknown): string {
  if (Array.isArray(value)) {
    return ` (${value.length} entries)`;
  }
  if (value instanceof Map || value instanceof Set) {
    return ` (${value.size} entries)`;
  }
  return '';
}

/**
 * Runs one step. A failure becomes `MAP_SUBLOAD_FAILED` naming the step, with
 * the original error as its cause; success is reported as an info diagnostic.
 */
function runSubLoad<T>(
  subLoad: MapSubLoad,
  context: LoadContext,
  resolvePath: () => string,
  load: (path: string) => T,
): T {
  let filePath: string | undefined;
  let value: T;
  try {
    filePath = resolvePath();
    value = load(filePath);
  } catch (error) {
    const source = filePath === undefined ? '' : ` from ${filePath}`;
    throw new MapLoadError(
      'MAP_SUBLOAD_FAILED',
      `Failed to load ${subLoad}${source}: ${describeError(error)}`,
      { subLoad, ...(filePath === undefined ? {} : { filePath }) },
      { cause: error },
    );
  }
  context.diagnostics?.report({
    code: MAP_DIAGNOSTIC_CODES.MAP_SUBLOAD_COMPLETE,
    path: subLoad,
    severity: 'info',
    message: `Loaded ${subLoad}${describeSize(value)}.`,
    ...(filePath === undefined ? {} : { filePath }),
  });
  return value;
}

/**
 * Loads a whole game root. Steps run one after another and the first failure
 * aborts the load; no partial model is returned.
 */
export function loadMap(rootPath: string, options: MapLoadOptions): LoadedMap {
  const layout = resolveMapLayout(options.layout);
  const collector = createDiagnosticCollector(options.diagnostics);
  const context: LoadContext = { diagnostics: collector };

  const manifestPath = toNativePath(rootPath, layout.manifest);
  const manifest = runSubLoad('manifest', context, () => manifestPath, loadDefaultMap);

  const step = <T>(subLoad: MapSubLoad, relativePath: string, load: (path: string) => T): T =>
    runSubLoad(subLoad, context, () => resolveManifestPath(manifestPath, relativePath), load);
  const rootStep = <T>(subLoad: MapSubLoad, relativePath: string, load: (path: string) => T): T =>
    runSubLoad(subLoad, context, () => toNativePath(rootPath, relativePath), load);

  const terrainTypes = rootStep('terrainTypes', layout.terrainTypes, loadTerrainTypes);
  const definitions = step('definitions', manifest.definitions, (path) => loadDefinitions(path, context));
  const continents = step('continents', manifest.continent, loadContinents);
  const adjacencyRules = step('adjacencyRules', manifest.adjacencyRules, (path) => loadAdjacencyRules(path, context));
  const adjacencies = step('adjacencies', manifest.adjacencies, (path) => loadAdjacencies(path, context));
  const seasons = step('seasons', manifest.seasons, loadSeasons);
  const strategicRegions = step('strategicRegions', layout.strategicRegions, (path) =>
    loadStrategicRegions(path, context),
  );
  const supplyNodes = step('supplyNodes', layout.supplyNodes, loadSupplyNodes);
  const railways = step('railways', layout.railways, loadRailways);
  const airports = step('airports', layout.airports, loadAirports);
  const rocketSites = step('rocketSites', layout.rocketSites, loadRocketSites);
  const buildingTypesPath = toNativePath(rootPath, layout.buildingTypes);
  const buildings = step('buildings', layout.buildings, (path) => loadBuildings(buildingTypesPath, path, context));
  const states = rootStep('states', layout.states, (path) => loadStates(path, context));
  const cities = step('cities', layout.cities, loadCities);
  const colors = step('colors', layout.colors, loadColors);
  const unitStacks = step('unitStacks', layout.unitStacks, (path) => loadUnitStacks(path, context));
  const weatherPositions = step('weatherPositions', layout.weatherPositions, (path) =>
    loadWeatherPositions(path, context),
  );

  const raster = (subLoad: MapSubLoad, relativePath: string) =>
    step(subLoad, relativePath, (path) => decodeRaster(options.rasterDecoder, path));
  const rasters: MapRasters = {
    provinces: raster('rasters.provinces', manifest.provinces),
    terrain: raster('rasters.terrain', manifest.terrain),
    rivers: raster('rasters.rivers', manifest.rivers),
    heightmap: raster('rasters.heightmap', manifest.heightmap),
    trees: raster('rasters.trees', manifest.treeDefinition),
  };

  const map: MapModel = Object.freeze({
    rootPath,
    manifestPath,
    manifest,
    terrainTypes,
    definitions,
    continents,
    adjacencyRules,
    adjacencies,
    seasons,
    treeIndices: manifest.tree,
    strategicRegions,
    supplyNodes,
    railways,
    airports,
    rocketSites,
    buildingTypes: buildings.types,
    buildings: buildings.buildings,
    states,
    cities,
    colors,
    unitStacks,
    weatherPositions,
    rasters,
  });

  for (const diagnostic of crossValidateMap(map)) {
    collector.report(diagnostic);
  }

  return { map, diagnostics: [...collector.diagnostics] };
}

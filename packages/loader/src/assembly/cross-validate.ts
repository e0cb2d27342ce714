import type { ProvinceId } from '../kernel/branded.js';
import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import type { MapDiagnosticCode } from '../kernel/diagnostic-codes.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { colorKey } from '../kernel/scalars.js';
import { definitionColor } from '../components/definitions.js';
import type { MapModel, MapRasters } from './map-model.js';

const RASTER_NAMES = ['terrain', 'rivers', 'heightmap', 'trees'] as const satisfies readonly (keyof MapRasters)[];

function warning(
  code: MapDiagnosticCode,
  path: string,
  message: string,
  entityId?: string,
  suggestion?: string,
): Diagnostic {
  return {
    code,
    path,
    severity: 'warning',
    message,
    ...(entityId === undefined ? {} : { entityId }),
    ...(suggestion === undefined ? {} : { suggestion }),
  };
}

/**
 * Checks that span several files. Every finding is a warning; the model is
 * usable either way.
 */
export function crossValidateMap(map: MapModel): readonly Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const seenIds = new Set<ProvinceId>();
  const seenColors = new Map<string, ProvinceId>();

  for (const [index, definition] of map.definitions.entries()) {
    const path = `definitions[${index}]`;
    const entityId = String(definition.id);

    if (seenIds.has(definition.id)) {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_PROVINCE_ID_DUPLICATE,
          `${path}.id`,
          `Province ${definition.id} is defined more than once.`,
          entityId,
        ),
      );
    }
    seenIds.add(definition.id);

    const color = colorKey(definitionColor(definition));
    const colorOwner = seenColors.get(color);
    if (colorOwner === undefined) {
      seenColors.set(color, definition.id);
    } else {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_PROVINCE_COLOR_DUPLICATE,
          `${path}.color`,
          `Province ${definition.id} uses color ${color}, already used by province ${colorOwner}.`,
          entityId,
        ),
      );
    }

    if (!map.terrainTypes.has(definition.terrain)) {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_TERRAIN_UNDECLARED,
          `${path}.terrain`,
          `Province ${definition.id} uses undeclared terrain "${definition.terrain}".`,
          entityId,
          'Declare the terrain in the terrain catalog or use a declared one.',
        ),
      );
    }

    if (definition.continent < 0 || definition.continent > map.continents.length) {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_CONTINENT_INDEX_OUT_OF_RANGE,
          `${path}.continent`,
          `Province ${definition.id} refers to continent ${definition.continent}, but ${map.continents.length} continents are declared.`,
          entityId,
        ),
      );
    }
  }

  for (const [index, adjacency] of map.adjacencies.entries()) {
    const path = `adjacencies[${index}]`;
    const entityId = `${adjacency.from}-${adjacency.to}`;

    if (adjacency.adjacencyType === 'sea' && adjacency.through === undefined) {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_SEA_ADJACENCY_THROUGH_MISSING,
          `${path}.through`,
          `Sea adjacency ${adjacency.from} -> ${adjacency.to} has no "through" province.`,
          entityId,
        ),
      );
    }

    if (adjacency.ruleName !== undefined && !map.adjacencyRules.has(adjacency.ruleName)) {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_ADJACENCY_RULE_MISSING,
          `${path}.ruleName`,
          `Adjacency ${adjacency.from} -> ${adjacency.to} references unknown rule "${adjacency.ruleName}".`,
          entityId,
        ),
      );
    }
  }

  const { provinces } = map.rasters;
  for (const name of RASTER_NAMES) {
    const raster = map.rasters[name];
    if (raster.width !== provinces.width || raster.height !== provinces.height) {
      diagnostics.push(
        warning(
          MAP_DIAGNOSTIC_CODES.XREF_RASTER_SIZE_MISMATCH,
          `rasters.${name}`,
          `The ${name} raster is ${raster.width}x${raster.height}; the provinces raster is ${provinces.width}x${provinces.height}.`,
        ),
      );
    }
  }

  return diagnostics;
}

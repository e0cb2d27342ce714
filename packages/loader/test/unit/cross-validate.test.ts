import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { crossValidateMap } from '../../src/assembly/cross-validate.js';
import { loadMap } from '../../src/assembly/load-map.js';
import type { MapModel } from '../../src/assembly/map-model.js';
import type { Definition } from '../../src/components/definitions.js';
import { asAdjacencyRuleName, asContinentIndex, asProvinceId, asTerrain } from '../../src/kernel/branded.js';
import { MINIMAL_MAP_ROOT } from '../helpers/fixture-files.js';
import { blankRaster, createRasterDecoderStub } from '../helpers/raster-stub.js';

const baseMap = (): MapModel => loadMap(MINIMAL_MAP_ROOT, { rasterDecoder: createRasterDecoderStub() }).map;

function definitionAt(map: MapModel, index: number): Definition {
  const definition = map.definitions[index];
  if (definition === undefined) {
    throw new assert.AssertionError({ message: `No definition at ${index}` });
  }
  return definition;
}

describe('crossValidateMap', () => {
  it('finds nothing in a consistent map', () => {
    assert.deepEqual(crossValidateMap(baseMap()), []);
  });

  it('reports repeated province ids and colors', () => {
    const map = baseMap();
    const diagnostics = crossValidateMap({ ...map, definitions: [...map.definitions, definitionAt(map, 1)] });
    assert.deepEqual(diagnostics, [
      {
        code: 'XREF_PROVINCE_ID_DUPLICATE',
        path: 'definitions[4].id',
        severity: 'warning',
        message: 'Province 1 is defined more than once.',
        entityId: '1',
      },
      {
        code: 'XREF_PROVINCE_COLOR_DUPLICATE',
        path: 'definitions[4].color',
        severity: 'warning',
        message: 'Province 1 uses color 10,20,30, already used by province 1.',
        entityId: '1',
      },
    ]);
  });

  it('reports undeclared terrain and out-of-range continents', () => {
    const map = baseMap();
    const definitions = [
      definitionAt(map, 0),
      { ...definitionAt(map, 1), continent: asContinentIndex(3) },
      { ...definitionAt(map, 2), terrain: asTerrain('swamp'), continent: asContinentIndex(2) },
      definitionAt(map, 3),
    ];
    assert.deepEqual(crossValidateMap({ ...map, definitions }), [
      {
        code: 'XREF_CONTINENT_INDEX_OUT_OF_RANGE',
        path: 'definitions[1].continent',
        severity: 'warning',
        message: 'Province 1 refers to continent 3, but 2 continents are declared.',
        entityId: '1',
      },
      {
        code: 'XREF_TERRAIN_UNDECLARED',
        path: 'definitions[2].terrain',
        severity: 'warning',
        message: 'Province 2 uses undeclared terrain "swamp".',
        entityId: '2',
        suggestion: 'Declare the terrain in the terrain catalog or use a declared one.',
      },
    ]);
  });

  it('reports sea crossings without a through province and unknown rules', () => {
    const map = baseMap();
    const adjacencies = [
      { from: asProvinceId(1), to: asProvinceId(2), adjacencyType: 'sea' as const },
      { from: asProvinceId(1), to: asProvinceId(3), ruleName: asAdjacencyRuleName('NOPE') },
    ];
    assert.deepEqual(crossValidateMap({ ...map, adjacencies }), [
      {
        code: 'XREF_SEA_ADJACENCY_THROUGH_MISSING',
        path: 'adjacencies[0].through',
        severity: 'warning',
        message: 'Sea adjacency 1 -> 2 has no "through" province.',
        entityId: '1-2',
      },
      {
        code: 'XREF_ADJACENCY_RULE_MISSING',
        path: 'adjacencies[1].ruleName',
        severity: 'warning',
        message: 'Adjacency 1 -> 3 references unknown rule "NOPE".',
        entityId: '1-3',
      },
    ]);
  });

  it('reports rasters whose size differs from the provinces raster', () => {
    const map = baseMap();
    const diagnostics = crossValidateMap({ ...map, rasters: { ...map.rasters, rivers: blankRaster(3, 2) } });
    assert.deepEqual(diagnostics, [
      {
        code: 'XREF_RASTER_SIZE_MISMATCH',
        path: 'rasters.rivers',
        severity: 'warning',
        message: 'The rivers raster is 3x2; the provinces raster is 4x2.',
      },
    ]);
  });
});

import * as assert from 'node:assert/strict';
import { join } from 'node:path';
import { describe, it } from 'node:test';

import { FLOATING_HARBOR_BUILDING, loadBuildings, loadBuildingTypes } from '../../src/components/buildings.js';
import { createDiagnosticCollector } from '../../src/kernel/diagnostics.js';
import { diagnosticCodes } from '../helpers/diagnostic-helpers.js';
import { assertMapLoadError } from '../helpers/error-assertions.js';
import { MINIMAL_MAP_ROOT, withTempDir, writeTextFile } from '../helpers/fixture-files.js';

const TYPES_PATH = join(MINIMAL_MAP_ROOT, 'common', 'buildings', '00_buildings.txt');

describe('loadBuildingTypes', () => {
  it('reads declared types and always accepts floating harbors', () => {
    assert.deepEqual([...loadBuildingTypes(TYPES_PATH)], ['infrastructure', 'naval_base', FLOATING_HARBOR_BUILDING]);
  });

  it('rejects a type declared twice', () => {
    withTempDir((dir) => {
      const path = writeTextFile(dir, 'types.txt', 'buildings = {\n\tbunker = { }\n\tbunker = { }\n}\n');
      assertMapLoadError(
        () => loadBuildingTypes(path),
        'DECLARED_TYPE_DUPLICATE',
        `${path}:3: building type "bunker" is declared more than once.`,
      );
    });
  });

  it('requires a top-level block', () => {
    withTempDir((dir) => {
      const path = writeTextFile(dir, 'types.txt', 'buildings = 1\n');
      assertMapLoadError(
        () => loadBuildingTypes(path),
        'KEY_FILE_INVALID',
        `${path}: expected a top-level block of building type.`,
      );
    });
  });
});

describe('loadBuildings', () => {
  it('reads placements of declared types', () => {
    const { buildings } = loadBuildings(TYPES_PATH, join(MINIMAL_MAP_ROOT, 'map', 'buildings.txt'));
    assert.deepEqual(buildings, [
      { stateId: 1, buildingId: 'infrastructure', x: 10, y: 0, z: 20, rotation: 0, adjacentSeaProvince: 0 },
      { stateId: 1, buildingId: 'naval_base', x: 12, y: 0, z: 22, rotation: 1.57, adjacentSeaProvince: 3 },
    ]);
  });

  it('drops undeclared types and malformed rows with warnings', () => {
    withTempDir((dir) => {
      const path = writeTextFile(
        dir,
        'buildings.txt',
        '1;bunker;1.0;0.0;1.0;0.0;0\n2;floating_harbor;1.0;0.0;1.0;0.0;5\n3;infrastructure;x;0.0;1.0;0.0;0\n4;infrastructure;2.0;0.0;2.0;0.5\n',
      );
      const collector = createDiagnosticCollector();
      const { buildings } = loadBuildings(TYPES_PATH, path, { diagnostics: collector });
      assert.deepEqual(
        buildings.map((building) => [building.stateId, building.buildingId, building.adjacentSeaProvince]),
        [
          [2, 'floating_harbor', 5],
          [4, 'infrastructure', 0],
        ],
      );
      assert.deepEqual(diagnosticCodes(collector.diagnostics), ['DELIMITED_ROW_SKIPPED', 'BUILDING_TYPE_UNDECLARED']);
      assert.deepEqual(collector.diagnostics[1], {
        code: 'BUILDING_TYPE_UNDECLARED',
        path: 'buildings[0].buildingId',
        severity: 'warning',
        message: 'Building type "bunker" is not declared; the building in state 1 is dropped.',
        entityId: 'bunker',
        filePath: path,
      });
    });
  });
});

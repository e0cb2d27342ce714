import * as assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it } from 'node:test';

import { loadDefaultMap, resolveManifestPath } from '../../src/manifest/default-map.js';
import { assertMapLoadError } from '../helpers/error-assertions.js';
import { MINIMAL_MAP_ROOT, withTempDir, writeTextFile } from '../helpers/fixture-files.js';

const MANIFEST_PATH = join(MINIMAL_MAP_ROOT, 'map', 'default.map');

describe('loadDefaultMap', () => {
  it('reads every asset path and the tree palette', () => {
    assert.deepEqual(loadDefaultMap(MANIFEST_PATH), {
      definitions: 'definition.csv',
      provinces: 'provinces.bmp',
      positions: 'positions.txt',
      terrain: 'terrain.bmp',
      rivers: 'rivers.bmp',
      heightmap: 'heightmap.bmp',
      treeDefinition: 'trees.bmp',
      continent: 'continent.txt',
      adjacencyRules: 'adjacency_rules.txt',
      adjacencies: 'adjacencies.csv',
      climate: 'weatherpositions.txt',
      ambientObject: 'ambient_object.txt',
      seasons: 'seasons.txt',
      tree: [3, 4, 7, 10],
    });
  });

  it('treats the climate entry as optional', () => {
    withTempDir((dir) => {
      const text = readFileSync(MANIFEST_PATH, 'utf8').replace('climate = "weatherpositions.txt"\n', '');
      const manifest = loadDefaultMap(writeTextFile(dir, 'default.map', text));
      assert.equal('climate' in manifest, false);
    });
  });

  it('rejects a missing entry and an absolute path', () => {
    withTempDir((dir) => {
      const missing = writeTextFile(
        dir,
        'missing.map',
        readFileSync(MANIFEST_PATH, 'utf8').replace('seasons = "seasons.txt"\n', ''),
      );
      assertMapLoadError(() => loadDefaultMap(missing), 'CLAUSE_DECODE_FAILED', `${missing}:1: missing required key "seasons".`);

      const absolute = writeTextFile(
        dir,
        'absolute.map',
        readFileSync(MANIFEST_PATH, 'utf8').replace('"definition.csv"', '"/srv/definition.csv"'),
      );
      assertMapLoadError(
        () => loadDefaultMap(absolute),
        'SCALAR_FORMAT_INVALID',
        `${absolute}:1: definitions: Invalid asset path "/srv/definition.csv": expected a relative path.`,
      );
    });
  });
});

describe('resolveManifestPath', () => {
  it('joins manifest-relative paths onto the manifest directory', () => {
    assert.equal(resolveManifestPath(join('/game', 'map', 'default.map'), 'strategicregions'), join('/game', 'map', 'strategicregions'));
    assert.equal(resolveManifestPath('default.map', 'rail/lines.txt'), join('rail', 'lines.txt'));
  });

  it('rejects a manifest path without a file name', () => {
    assertMapLoadError(
      () => resolveManifestPath('/', 'definition.csv'),
      'FILE_NOT_FOUND',
      'Manifest path "/" has no parent directory or file name.',
    );
  });
});

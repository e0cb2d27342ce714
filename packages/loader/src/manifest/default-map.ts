import { basename, dirname, join } from 'node:path';

import type { TreeIndex } from '../kernel/branded.js';
import { MapLoadError } from '../kernel/map-load-error.js';
import { parseAssetPath } from '../kernel/scalars.js';
import { listOf, loadClauseFile, scalarDecoder } from '../grammar/clause-decoder.js';
import type { ClauseFieldReader } from '../grammar/clause-decoder.js';
import { decodeTreeIndex } from '../grammar/scalar-decoders.js';

/**
 * The map manifest (`map/default.map`). Every path is relative to the
 * directory holding the manifest.
 */
export interface DefaultMap {
  readonly definitions: string;
  readonly provinces: string;
  readonly positions: string;
  readonly terrain: string;
  readonly rivers: string;
  readonly heightmap: string;
  readonly treeDefinition: string;
  readonly continent: string;
  readonly adjacencyRules: string;
  readonly adjacencies: string;
  readonly climate?: string;
  readonly ambientObject: string;
  readonly seasons: string;
  /** Palette indices of `treeDefinition` that hold trees. */
  readonly tree: readonly TreeIndex[];
}

const decodeAssetPath = scalarDecoder(parseAssetPath);

export const decodeDefaultMapDocument = (document: ClauseFieldReader): DefaultMap => {
  const climate = document.optional('climate', decodeAssetPath);
  return {
    definitions: document.required('definitions', decodeAssetPath),
    provinces: document.required('provinces', decodeAssetPath),
    positions: document.required('positions', decodeAssetPath),
    terrain: document.required('terrain', decodeAssetPath),
    rivers: document.required('rivers', decodeAssetPath),
    heightmap: document.required('heightmap', decodeAssetPath),
    treeDefinition: document.required('tree_definition', decodeAssetPath),
    continent: document.required('continent', decodeAssetPath),
    adjacencyRules: document.required('adjacency_rules', decodeAssetPath),
    adjacencies: document.required('adjacencies', decodeAssetPath),
    ...(climate === undefined ? {} : { climate }),
    ambientObject: document.required('ambient_object', decodeAssetPath),
    seasons: document.required('seasons', decodeAssetPath),
    tree: document.required('tree', listOf(decodeTreeIndex)),
  };
};

export function loadDefaultMap(path: string): DefaultMap {
  return loadClauseFile(path, decodeDefaultMapDocument);
}

/** Joins a manifest-relative path onto the manifest's directory. */
export function resolveManifestPath(manifestPath: string, relativePath: string): string {
  const directory = dirname(manifestPath);
  if (basename(manifestPath) === '' || directory === manifestPath) {
    throw new MapLoadError(
      'FILE_NOT_FOUND',
      `Manifest path "${manifestPath}" has no parent directory or file name.`,
      { filePath: manifestPath },
    );
  }
  return join(directory, ...relativePath.split('/'));
}

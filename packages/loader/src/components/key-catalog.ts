import { asTerrain } from '../kernel/branded.js';
import type { Terrain } from '../kernel/branded.js';
import { MapLoadError } from '../kernel/map-load-error.js';
import { loadClauseDocument } from '../grammar/clause-parser.js';

/**
 * Keys of the first top-level block of a definition file, such as the
 * building types under `buildings = { ... }` or the terrain types under
 * `categories = { ... }`. A key declared twice is an error.
 */
export function loadKeyCatalog(path: string, label: string): readonly string[] {
  const [first] = loadClauseDocument(path).items;
  if (first === undefined || first.kind !== 'field' || first.value.kind !== 'block') {
    throw new MapLoadError('KEY_FILE_INVALID', `${path}: expected a top-level block of ${label}.`, { filePath: path });
  }

  const keys: string[] = [];
  const seen = new Set<string>();
  for (const item of first.value.items) {
    if (item.kind !== 'field') {
      continue;
    }
    if (seen.has(item.key)) {
      throw new MapLoadError(
        'DECLARED_TYPE_DUPLICATE',
        `${path}:${item.line}: ${label} "${item.key}" is declared more than once.`,
        { filePath: path, line: item.line, entityId: item.key },
      );
    }
    seen.add(item.key);
    keys.push(item.key);
  }
  return keys;
}

export function loadTerrainTypes(path: string): ReadonlySet<Terrain> {
  return new Set(loadKeyCatalog(path, 'terrain type').map(asTerrain));
}

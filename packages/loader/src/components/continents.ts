import type { ContinentName } from '../kernel/branded.js';
import { listOf, loadClauseFile } from '../grammar/clause-decoder.js';
import { decodeContinentName } from '../grammar/scalar-decoders.js';

/** Continent names in declaration order. Definitions refer to them by one-based index. */
export function loadContinents(path: string): readonly ContinentName[] {
  return loadClauseFile(path, (document) => document.required('continents', listOf(decodeContinentName)));
}

import type { Color } from '../kernel/scalars.js';
import { loadClauseFile } from '../grammar/clause-decoder.js';
import { decodeColor } from '../grammar/scalar-decoders.js';

/** Every `color = { r g b }` entry, in file order. */
export function loadColors(path: string): readonly Color[] {
  return loadClauseFile(path, (document) => document.duplicated('color', decodeColor));
}

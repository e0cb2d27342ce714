import type { ColorIndex, Distance, MeshId, PixelDensity, PixelStep } from '../kernel/branded.js';
import { decodeString, listOf, loadClauseFile, objectDecoder } from '../grammar/clause-decoder.js';
import type { ClauseDecoder, ClauseFieldReader } from '../grammar/clause-decoder.js';
import {
  decodeColorIndex,
  decodeDistance,
  decodeMeshId,
  decodePixelDensity,
  decodePixelStep,
} from '../grammar/scalar-decoders.js';

export interface BuildingMesh {
  readonly distance: Distance;
  readonly mesh: readonly MeshId[];
}

export interface CityGroup {
  readonly colorIndex: ColorIndex;
  readonly density: PixelDensity;
  readonly building: readonly BuildingMesh[];
}

export interface Cities {
  /** Relative to the game root, e.g. `map/cities.bmp`. */
  readonly typesSource: string;
  readonly pixelStepX: PixelStep;
  readonly pixelStepY: PixelStep;
  readonly cityGroup: readonly CityGroup[];
}

/** `mesh = "a"` and `mesh = { "a" "b" }` are both accepted. */
const decodeMeshList: ClauseDecoder<readonly MeshId[]> = (node, path) =>
  node.kind === 'scalar' ? [decodeMeshId(node, path)] : listOf(decodeMeshId)(node, path);

const decodeBuildingMesh: ClauseDecoder<BuildingMesh> = objectDecoder((fields) => ({
  distance: fields.required('distance', decodeDistance),
  mesh: fields.required('mesh', decodeMeshList),
}));

const decodeCityGroup: ClauseDecoder<CityGroup> = objectDecoder((fields) => ({
  colorIndex: fields.required('color_index', decodeColorIndex),
  density: fields.required('density', decodePixelDensity),
  building: fields.duplicated('building', decodeBuildingMesh),
}));

export const decodeCitiesDocument = (document: ClauseFieldReader): Cities => ({
  typesSource: document.required('types_source', decodeString),
  pixelStepX: document.required('pixel_step_x', decodePixelStep),
  pixelStepY: document.required('pixel_step_y', decodePixelStep),
  cityGroup: document.duplicated('city_group', decodeCityGroup),
});

export function loadCities(path: string): Cities {
  return loadClauseFile(path, decodeCitiesDocument);
}

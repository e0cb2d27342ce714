import { asBlue, asGreen, asRed } from '../kernel/branded.js';
import { describeError, MapLoadError } from '../kernel/map-load-error.js';
import type { Color } from '../kernel/scalars.js';

/** Decoded image: `pixels` holds `width * height` RGB triples, row by row from the top left. */
export interface RgbRaster {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array;
}

/** Supplied by the caller; this package does not decode bitmaps itself. */
export interface RasterDecoder {
  decode(path: string): RgbRaster;
}

function invalidRaster(path: string, reason: string): MapLoadError {
  return new MapLoadError('RASTER_DECODE_FAILED', `${path}: ${reason}`, { filePath: path });
}

export function decodeRaster(decoder: RasterDecoder, path: string): RgbRaster {
  let raster: RgbRaster;
  try {
    raster = decoder.decode(path);
  } catch (error) {
    throw new MapLoadError(
      'RASTER_DECODE_FAILED',
      `${path}: ${describeError(error)}`,
      { filePath: path },
      { cause: error },
    );
  }
  if (!Number.isInteger(raster.width) || !Number.isInteger(raster.height) || raster.width < 0 || raster.height < 0) {
    throw invalidRaster(path, `invalid dimensions ${raster.width}x${raster.height}.`);
  }
  const expected = raster.width * raster.height * 3;
  if (raster.pixels.length !== expected) {
    throw invalidRaster(path, `expected ${expected} bytes of RGB data, found ${raster.pixels.length}.`);
  }
  return raster;
}

export function rasterPixel(raster: RgbRaster, x: number, y: number): Color | undefined {
  if (x < 0 || y < 0 || x >= raster.width || y >= raster.height) {
    return undefined;
  }
  const offset = (y * raster.width + x) * 3;
  const r = raster.pixels[offset];
  const g = raster.pixels[offset + 1];
  const b = raster.pixels[offset + 2];
  return r === undefined || g === undefined || b === undefined ? undefined : { r: asRed(r), g: asGreen(g), b: asBlue(b) };
}

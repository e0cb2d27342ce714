import { z } from 'zod';

import type { StrategicRegionId } from '../kernel/branded.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { parseFiniteFloat, parseScalarText, parseStrategicRegionId } from '../kernel/scalars.js';
import { readDelimitedRecords, requiredCell } from '../grammar/delimited-records.js';
import type { DelimitedRecord } from '../grammar/delimited-records.js';

export const WEATHER_EFFECT_SIZES = ['big', 'small'] as const;

export type WeatherEffectSize = (typeof WEATHER_EFFECT_SIZES)[number];

const WeatherEffectSizeSchema = z.string().pipe(
  z.enum(WEATHER_EFFECT_SIZES, { errorMap: () => ({ message: 'expected big or small' }) }),
);

export interface WeatherPosition {
  readonly strategicRegion: StrategicRegionId;
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly size: WeatherEffectSize;
}

const WEATHER_POSITION_COLUMNS = {
  strategicRegion: { name: 'id', index: 0 },
  x: { name: 'x', index: 1 },
  y: { name: 'y', index: 2 },
  z: { name: 'z', index: 3 },
  size: { name: 'size', index: 4 },
} as const;

export function decodeWeatherPositionRecord(record: DelimitedRecord): WeatherPosition {
  return {
    strategicRegion: requiredCell(record, WEATHER_POSITION_COLUMNS.strategicRegion, parseStrategicRegionId),
    x: requiredCell(record, WEATHER_POSITION_COLUMNS.x, parseFiniteFloat),
    y: requiredCell(record, WEATHER_POSITION_COLUMNS.y, parseFiniteFloat),
    z: requiredCell(record, WEATHER_POSITION_COLUMNS.z, parseFiniteFloat),
    size: requiredCell(record, WEATHER_POSITION_COLUMNS.size, (text) =>
      parseScalarText(WeatherEffectSizeSchema, text, 'weather effect size'),
    ),
  };
}

export function loadWeatherPositions(path: string, context: LoadContext = {}): readonly WeatherPosition[] {
  return readDelimitedRecords(path, { header: false, mode: 'loose', decode: decodeWeatherPositionRecord }, context);
}

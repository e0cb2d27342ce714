import { join } from 'node:path';

import { asStrategicRegionId } from '../kernel/branded.js';
import type {
  ProvinceId,
  SnowLevel,
  StrategicRegionId,
  StrategicRegionName,
  Temperature,
  Weight,
} from '../kernel/branded.js';
import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { reportDiagnostic } from '../kernel/diagnostics.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { describeError, MapLoadError } from '../kernel/map-load-error.js';
import { formatDayMonth, parseStrategicRegionId } from '../kernel/scalars.js';
import type { DayMonth } from '../kernel/scalars.js';
import { clauseDecodeError, listOf, loadClauseFile, objectDecoder } from '../grammar/clause-decoder.js';
import type { ClauseDecoder, ClauseFieldReader } from '../grammar/clause-decoder.js';
import type { ClauseBlock } from '../grammar/clause-parser.js';
import { ClauseBlockBuilder, clauseList, formatClauseDocument } from '../grammar/clause-writer.js';
import {
  decodeDayMonth,
  decodeProvinceId,
  decodeSnowLevel,
  decodeStrategicRegionId,
  decodeStrategicRegionName,
  decodeTemperature,
  decodeWeight,
} from '../grammar/scalar-decoders.js';
import { listDirectoryFiles } from '../grammar/source-files.js';

export const STRATEGIC_REGION_FILE_SUFFIX = 'StrategicRegion.txt';

const INVALID_STRATEGIC_REGION_ID = asStrategicRegionId(0);

export interface DayMonthRange {
  readonly start: DayMonth;
  readonly end: DayMonth;
}

export interface TemperatureRange {
  readonly min: Temperature;
  readonly max: Temperature;
}

export interface WeatherPeriod {
  readonly between: readonly DayMonthRange[];
  readonly temperature: TemperatureRange;
  readonly noPhenomenon: Weight;
  readonly rainLight: Weight;
  readonly rainHeavy: Weight;
  readonly snow: Weight;
  readonly blizzard: Weight;
  readonly arcticWater: Weight;
  readonly mud: Weight;
  readonly sandstorm: Weight;
  readonly minSnowLevel: SnowLevel;
}

export interface StrategicRegion {
  readonly id: StrategicRegionId;
  readonly name: StrategicRegionName;
  readonly provinces: readonly ProvinceId[];
  readonly weather: readonly WeatherPeriod[];
}

export type StrategicRegions = ReadonlyMap<StrategicRegionId, StrategicRegion>;

/** Clause key of each weight, in file order. */
const WEATHER_WEIGHT_KEYS = [
  ['noPhenomenon', 'no_phenomenon'],
  ['rainLight', 'rain_light'],
  ['rainHeavy', 'rain_heavy'],
  ['snow', 'snow'],
  ['blizzard', 'blizzard'],
  ['arcticWater', 'arctic_water'],
  ['mud', 'mud'],
  ['sandstorm', 'sandstorm'],
] as const;

/** `between = { 0.0 30.11 }`: flat list read as start/end pairs. */
const decodeBetween: ClauseDecoder<readonly DayMonthRange[]> = (node, path) => {
  const values = listOf(decodeDayMonth)(node, path);
  if (values.length === 0 || values.length % 2 !== 0) {
    throw clauseDecodeError(`${path}: expected start/end pairs, found ${values.length} values.`, node.line);
  }
  const ranges: DayMonthRange[] = [];
  for (let index = 0; index + 1 < values.length; index += 2) {
    const start = values[index];
    const end = values[index + 1];
    if (start !== undefined && end !== undefined) {
      ranges.push({ start, end });
    }
  }
  return ranges;
};

const decodeTemperatureRange: ClauseDecoder<TemperatureRange> = (node, path) => {
  const [min, max, ...rest] = listOf(decodeTemperature)(node, path);
  if (min === undefined || max === undefined || rest.length > 0) {
    throw clauseDecodeError(`${path}: expected a minimum and a maximum temperature.`, node.line);
  }
  return { min, max };
};

export const decodeWeatherPeriod: ClauseDecoder<WeatherPeriod> = objectDecoder((fields) => ({
  between: fields.required('between', decodeBetween),
  temperature: fields.required('temperature', decodeTemperatureRange),
  noPhenomenon: fields.required('no_phenomenon', decodeWeight),
  rainLight: fields.required('rain_light', decodeWeight),
  rainHeavy: fields.required('rain_heavy', decodeWeight),
  snow: fields.required('snow', decodeWeight),
  blizzard: fields.required('blizzard', decodeWeight),
  arcticWater: fields.required('arctic_water', decodeWeight),
  mud: fields.required('mud', decodeWeight),
  sandstorm: fields.required('sandstorm', decodeWeight),
  minSnowLevel: fields.required('min_snow_level', decodeSnowLevel),
}));

export const decodeStrategicRegion: ClauseDecoder<StrategicRegion> = objectDecoder((fields) => ({
  id: fields.required('id', decodeStrategicRegionId),
  name: fields.required('name', decodeStrategicRegionName),
  provinces: fields.required('provinces', listOf(decodeProvinceId)),
  weather: fields.required(
    'weather',
    objectDecoder((weather) => weather.duplicated('period', decodeWeatherPeriod)),
  ),
}));

export const decodeStrategicRegionDocument = (document: ClauseFieldReader): StrategicRegion =>
  document.required('strategic_region', decodeStrategicRegion);

/** Decodes one strategic region file without checking it against its file name. */
export function loadStrategicRegion(path: string): StrategicRegion {
  return loadClauseFile(path, decodeStrategicRegionDocument);
}

export interface StrategicRegionFileName {
  readonly id: StrategicRegionId;
  readonly suffix: string;
}

/** `<id>-<suffix>`, for example `12-StrategicRegion.txt`. */
export function parseStrategicRegionFileName(fileName: string): StrategicRegionFileName {
  const [idText, suffix] = fileName.split('-');
  if (idText === undefined || suffix === undefined) {
    throw new MapLoadError('STRATEGIC_REGION_FILE_NAME_INVALID', `Invalid strategic region file name "${fileName}".`);
  }
  try {
    return { id: parseStrategicRegionId(idText), suffix };
  } catch (error) {
    throw new MapLoadError(
      'STRATEGIC_REGION_FILE_NAME_INVALID',
      `Invalid strategic region file name "${fileName}": ${describeError(error)}`,
      {},
      { cause: error },
    );
  }
}

export const isConventionalStrategicRegionFileName = (fileName: StrategicRegionFileName): boolean =>
  fileName.id >= 1 && fileName.suffix === STRATEGIC_REGION_FILE_SUFFIX;

/**
 * Loads every file of a strategic region directory, in name order. Any
 * invalid file aborts the whole directory.
 */
export function loadStrategicRegions(directory: string, context: LoadContext = {}): StrategicRegions {
  const regions = new Map<StrategicRegionId, StrategicRegion>();

  for (const fileName of listDirectoryFiles(directory)) {
    const filePath = join(directory, fileName);
    const parsedName = parseWithFilePath(filePath, () => parseStrategicRegionFileName(fileName));
    if (!isConventionalStrategicRegionFileName(parsedName)) {
      reportDiagnostic(context, {
        code: MAP_DIAGNOSTIC_CODES.STRATEGIC_REGION_FILE_NAME_UNEXPECTED,
        path: `strategic_regions.${fileName}`,
        severity: 'warning',
        message: `Strategic region file name "${fileName}" does not follow <id>-${STRATEGIC_REGION_FILE_SUFFIX}.`,
        filePath,
      });
    }

    const region = loadStrategicRegion(filePath);
    const entityId = String(region.id);
    if (region.id === INVALID_STRATEGIC_REGION_ID) {
      throw new MapLoadError('STRATEGIC_REGION_ID_INVALID', `${filePath}: strategic region id must not be 0.`, {
        filePath,
        entityId,
      });
    }
    if (region.name.length === 0) {
      throw new MapLoadError('STRATEGIC_REGION_NAME_EMPTY', `${filePath}: strategic region ${region.id} has an empty name.`, {
        filePath,
        entityId,
      });
    }
    if (region.id !== parsedName.id) {
      throw new MapLoadError(
        'STRATEGIC_REGION_FILE_NAME_INVALID',
        `${filePath}: strategic region ${region.id} is stored in a file named for region ${parsedName.id}.`,
        { filePath, entityId },
      );
    }

    if (regions.has(region.id)) {
      reportDiagnostic(context, {
        code: MAP_DIAGNOSTIC_CODES.STRATEGIC_REGION_DUPLICATE,
        path: `strategic_regions.${region.id}`,
        severity: 'warning',
        message: `Strategic region ${region.id} is declared by more than one file; ${fileName} is used.`,
        filePath,
        entityId,
      });
    }
    regions.set(region.id, region);
  }

  return regions;
}

function parseWithFilePath<T>(filePath: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof MapLoadError) {
      throw new MapLoadError(error.code, error.message, { ...error.context, filePath }, { cause: error });
    }
    throw error;
  }
}

function encodeWeatherPeriod(period: WeatherPeriod): ClauseBlock {
  const between = period.between.flatMap((range) => [formatDayMonth(range.start), formatDayMonth(range.end)]);
  const builder = new ClauseBlockBuilder()
    .list('between', between)
    .list('temperature', [period.temperature.min, period.temperature.max]);
  for (const [property, key] of WEATHER_WEIGHT_KEYS) {
    builder.scalar(key, period[property]);
  }
  return builder.scalar('min_snow_level', period.minSnowLevel).build();
}

export function encodeStrategicRegion(region: StrategicRegion): ClauseBlock {
  const weather = new ClauseBlockBuilder();
  for (const period of region.weather) {
    weather.field('period', encodeWeatherPeriod(period));
  }
  const body = new ClauseBlockBuilder()
    .scalar('id', region.id)
    .quoted('name', region.name)
    .field('provinces', clauseList(region.provinces))
    .field('weather', weather.build())
    .build();
  return new ClauseBlockBuilder().field('strategic_region', body).build();
}

export const formatStrategicRegion = (region: StrategicRegion): string =>
  formatClauseDocument(encodeStrategicRegion(region));

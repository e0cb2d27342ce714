import { z } from 'zod';

import {
  asAdjacencyRuleName,
  asBlue,
  asBuildingId,
  asBuildingsMaxLevelFactor,
  asColorIndex,
  asContinentIndex,
  asContinentName,
  asCountryTag,
  asDistance,
  asGreen,
  asLocalSupplies,
  asManpower,
  asMeshId,
  asModelIndex,
  asPixelDensity,
  asPixelStep,
  asProvinceId,
  asRailLevel,
  asRed,
  asSnowLevel,
  asStateCategoryName,
  asStateId,
  asStateName,
  asStrategicRegionId,
  asStrategicRegionName,
  asTemperature,
  asTerrain,
  asTreeIndex,
  asVictoryPoints,
  asWeight,
  asXCoord,
  asYCoord,
} from './branded.js';
import type {
  AdjacencyRuleName,
  Blue,
  BuildingId,
  BuildingsMaxLevelFactor,
  ColorIndex,
  ContinentIndex,
  ContinentName,
  CountryTag,
  Distance,
  Green,
  LocalSupplies,
  Manpower,
  MeshId,
  ModelIndex,
  PixelDensity,
  PixelStep,
  ProvinceId,
  RailLevel,
  Red,
  SnowLevel,
  StateCategoryName,
  StateId,
  StateName,
  StrategicRegionId,
  StrategicRegionName,
  Temperature,
  Terrain,
  TreeIndex,
  VictoryPoints,
  Weight,
  XCoord,
  YCoord,
} from './branded.js';
import { MapLoadError } from './map-load-error.js';

const I32_MIN = -2_147_483_648;
const I32_MAX = 2_147_483_647;
const U32_MAX = 4_294_967_295;
const DAYS_IN_MONTH: readonly number[] = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const SIGNED_INTEGER_PATTERN = /^[+-]?\d+$/;
const UNSIGNED_INTEGER_PATTERN = /^\+?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export type TextSchema<T> = z.ZodType<T, z.ZodTypeDef, string>;

const integerText = (pattern: RegExp, min: number, max: number): TextSchema<number> =>
  z
    .string()
    .regex(pattern, 'expected an integer literal')
    .transform(Number)
    .pipe(
      z
        .number()
        .int()
        .min(min, `expected a value >= ${min}`)
        .max(max, `expected a value <= ${max}`),
    );

export const I32TextSchema = integerText(SIGNED_INTEGER_PATTERN, I32_MIN, I32_MAX);
export const U8TextSchema = integerText(UNSIGNED_INTEGER_PATTERN, 0, 255);
export const U32TextSchema = integerText(UNSIGNED_INTEGER_PATTERN, 0, U32_MAX);
export const USizeTextSchema = integerText(UNSIGNED_INTEGER_PATTERN, 0, Number.MAX_SAFE_INTEGER);

export const FloatTextSchema: TextSchema<number> = z
  .string()
  .regex(FLOAT_PATTERN, 'expected a decimal literal')
  .transform(Number)
  .pipe(z.number().finite('expected a finite value'));

export const ClauseBooleanTextSchema: TextSchema<boolean> = z
  .string()
  .refine((text) => text === 'yes' || text === 'no', 'expected yes or no')
  .transform((text) => text === 'yes');

export const DelimitedBooleanTextSchema: TextSchema<boolean> = z
  .string()
  .refine((text) => text === 'true' || text === 'false', 'expected true or false')
  .transform((text) => text === 'true');

export interface Color {
  readonly r: Red;
  readonly g: Green;
  readonly b: Blue;
}

export type Hsv = readonly [hue: number, saturation: number, value: number];

/** Zero-based day of month and month of year. */
export interface DayMonth {
  readonly day: number;
  readonly month: number;
}

export interface GameDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export const DayMonthTextSchema: TextSchema<DayMonth> = z
  .string()
  .regex(/^\+?\d+\.\+?\d+$/, 'expected <day>.<month>')
  .transform((text) => {
    const [day, month] = text.split('.');
    return { day: Number(day), month: Number(month) };
  })
  .pipe(
    z.object({
      day: z.number().int().max(30, 'expected a day <= 30'),
      month: z.number().int().max(11, 'expected a month <= 11'),
    }),
  );

export const GameDateTextSchema: TextSchema<GameDate> = z
  .string()
  .regex(/^[+-]?\d+\.\+?\d+\.\+?\d+$/, 'expected <year>.<month>.<day>')
  .transform((text) => {
    const [year, month, day] = text.split('.');
    return { year: Number(year), month: Number(month), day: Number(day) };
  })
  .pipe(
    z
      .object({
        year: z.number().int().min(I32_MIN).max(I32_MAX),
        month: z.number().int().min(1, 'expected a month >= 1').max(12, 'expected a month <= 12'),
        day: z.number().int().min(1, 'expected a day >= 1'),
      })
      .superRefine((date, ctx) => {
        const limit = DAYS_IN_MONTH[date.month - 1];
        if (limit !== undefined && date.day > limit) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `expected a day <= ${limit} in month ${date.month}`,
          });
        }
      }),
  );

export function parseScalarText<T>(schema: TextSchema<T>, text: string, label: string): T {
  const result = schema.safeParse(text);
  if (result.success) {
    return result.data;
  }
  const reason = result.error.issues.map((issue) => issue.message).join('; ');
  throw new MapLoadError('SCALAR_FORMAT_INVALID', `Invalid ${label} "${text}": ${reason}.`);
}

export const parseI32 = (text: string, label = 'integer'): number => parseScalarText(I32TextSchema, text, label);
export const parseU8 = (text: string, label = 'byte'): number => parseScalarText(U8TextSchema, text, label);
export const parseU32 = (text: string, label = 'unsigned integer'): number => parseScalarText(U32TextSchema, text, label);
export const parseUSize = (text: string, label = 'count'): number => parseScalarText(USizeTextSchema, text, label);
export const parseFiniteFloat = (text: string, label = 'number'): number => parseScalarText(FloatTextSchema, text, label);
export const parseClauseBoolean = (text: string): boolean => parseScalarText(ClauseBooleanTextSchema, text, 'boolean');
export const parseDelimitedBoolean = (text: string): boolean =>
  parseScalarText(DelimitedBooleanTextSchema, text, 'boolean');

export const parseProvinceId = (text: string): ProvinceId => asProvinceId(parseI32(text, 'province id'));
export const parseStateId = (text: string): StateId => asStateId(parseI32(text, 'state id'));
export const parseStrategicRegionId = (text: string): StrategicRegionId =>
  asStrategicRegionId(parseI32(text, 'strategic region id'));
export const parseRed = (text: string): Red => asRed(parseU8(text, 'red channel'));
export const parseGreen = (text: string): Green => asGreen(parseU8(text, 'green channel'));
export const parseBlue = (text: string): Blue => asBlue(parseU8(text, 'blue channel'));
export const parseColorIndex = (text: string): ColorIndex => asColorIndex(parseU8(text, 'color index'));
export const parseXCoord = (text: string): XCoord => asXCoord(parseI32(text, 'x coordinate'));
export const parseYCoord = (text: string): YCoord => asYCoord(parseI32(text, 'y coordinate'));
export const parseContinentIndex = (text: string): ContinentIndex =>
  asContinentIndex(parseI32(text, 'continent index'));
export const parseRailLevel = (text: string): RailLevel => asRailLevel(parseU8(text, 'rail level'));
export const parseTreeIndex = (text: string): TreeIndex => asTreeIndex(parseUSize(text, 'tree index'));
export const parseManpower = (text: string): Manpower => asManpower(parseI32(text, 'manpower'));
export const parseModelIndex = (text: string): ModelIndex => asModelIndex(parseI32(text, 'model index'));
export const parsePixelStep = (text: string): PixelStep => asPixelStep(parseU32(text, 'pixel step'));

export const parseWeight = (text: string): Weight => asWeight(parseFiniteFloat(text, 'weight'));
export const parseTemperature = (text: string): Temperature => asTemperature(parseFiniteFloat(text, 'temperature'));
export const parseSnowLevel = (text: string): SnowLevel => asSnowLevel(parseFiniteFloat(text, 'snow level'));
export const parseVictoryPoints = (text: string): VictoryPoints =>
  asVictoryPoints(parseFiniteFloat(text, 'victory points'));
export const parseLocalSupplies = (text: string): LocalSupplies =>
  asLocalSupplies(parseFiniteFloat(text, 'local supplies'));
export const parseBuildingsMaxLevelFactor = (text: string): BuildingsMaxLevelFactor =>
  asBuildingsMaxLevelFactor(parseFiniteFloat(text, 'buildings max level factor'));
export const parsePixelDensity = (text: string): PixelDensity => asPixelDensity(parseFiniteFloat(text, 'density'));
export const parseDistance = (text: string): Distance => asDistance(parseFiniteFloat(text, 'distance'));

export const parseTerrain = (text: string): Terrain => asTerrain(text);
export const parseContinentName = (text: string): ContinentName => asContinentName(text);
export const parseAdjacencyRuleName = (text: string): AdjacencyRuleName => asAdjacencyRuleName(text);
export const parseBuildingId = (text: string): BuildingId => asBuildingId(text);
export const parseStrategicRegionName = (text: string): StrategicRegionName => asStrategicRegionName(text);
export const parseStateName = (text: string): StateName => asStateName(text);
export const parseStateCategoryName = (text: string): StateCategoryName => asStateCategoryName(text);
export const parseCountryTag = (text: string): CountryTag => asCountryTag(text);
export const parseMeshId = (text: string): MeshId => asMeshId(text);

export const parseDayMonth = (text: string): DayMonth => parseScalarText(DayMonthTextSchema, text, 'day-month');
export const parseGameDate = (text: string): GameDate => parseScalarText(GameDateTextSchema, text, 'date');

export const colorsEqual = (left: Color, right: Color): boolean =>
  left.r === right.r && left.g === right.g && left.b === right.b;

export const dayMonthsEqual = (left: DayMonth, right: DayMonth): boolean =>
  left.day === right.day && left.month === right.month;

export const gameDatesEqual = (left: GameDate, right: GameDate): boolean =>
  left.year === right.year && left.month === right.month && left.day === right.day;

export const formatDayMonth = (value: DayMonth): string => `${value.day}.${value.month}`;

export const formatGameDate = (value: GameDate): string => `${value.year}.${value.month}.${value.day}`;

export const colorKey = (color: Color): string => `${color.r},${color.g},${color.b}`;

/** Forward-slash path relative to some directory of the game root. */
export const AssetPathTextSchema: TextSchema<string> = z
  .string()
  .min(1, 'expected a nonempty path')
  .refine((text) => !text.includes('\\'), 'expected forward slashes')
  .refine((text) => !text.startsWith('/') && !/^[A-Za-z]:/.test(text), 'expected a relative path');

export const parseAssetPath = (text: string): string => parseScalarText(AssetPathTextSchema, text, 'asset path');

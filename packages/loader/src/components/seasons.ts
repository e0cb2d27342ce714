import { formatGameDate } from '../kernel/scalars.js';
import type { GameDate, Hsv } from '../kernel/scalars.js';
import { loadClauseFile, objectDecoder } from '../grammar/clause-decoder.js';
import type { ClauseDecoder, ClauseFieldReader } from '../grammar/clause-decoder.js';
import type { ClauseBlock } from '../grammar/clause-parser.js';
import { ClauseBlockBuilder, formatClauseDocument } from '../grammar/clause-writer.js';
import { decodeGameDate, decodeHsv } from '../grammar/scalar-decoders.js';

export interface Season {
  readonly startDate: GameDate;
  readonly endDate: GameDate;
  readonly hsvNorth: Hsv;
  readonly colorBalanceNorth: Hsv;
  readonly hsvCenter: Hsv;
  readonly colorBalanceCenter: Hsv;
  readonly hsvSouth: Hsv;
  readonly colorBalanceSouth: Hsv;
}

export interface TreeSeason {
  readonly startDate: GameDate;
  readonly endDate: GameDate;
}

export interface Seasons {
  readonly winter: Season;
  readonly spring: Season;
  readonly summer: Season;
  readonly autumn: Season;
  readonly treeWinter: TreeSeason;
  readonly treeWinter2: TreeSeason;
  readonly treeSpring: TreeSeason;
  readonly treeSpring2: TreeSeason;
  readonly treeSummer: TreeSeason;
  readonly treeSummer2: TreeSeason;
  readonly treeAutumn: TreeSeason;
  readonly treeAutumn2: TreeSeason;
}

const SEASON_HSV_KEYS = [
  ['hsvNorth', 'hsv_north'],
  ['colorBalanceNorth', 'colorbalance_north'],
  ['hsvCenter', 'hsv_center'],
  ['colorBalanceCenter', 'colorbalance_center'],
  ['hsvSouth', 'hsv_south'],
  ['colorBalanceSouth', 'colorbalance_south'],
] as const;

const SEASON_KEYS = [
  ['winter', 'winter'],
  ['spring', 'spring'],
  ['summer', 'summer'],
  ['autumn', 'autumn'],
] as const;

const TREE_SEASON_KEYS = [
  ['treeWinter', 'tree_winter'],
  ['treeWinter2', 'tree_winter2'],
  ['treeSpring', 'tree_spring'],
  ['treeSpring2', 'tree_spring2'],
  ['treeSummer', 'tree_summer'],
  ['treeSummer2', 'tree_summer2'],
  ['treeAutumn', 'tree_autumn'],
  ['treeAutumn2', 'tree_autumn2'],
] as const;

export const decodeSeason: ClauseDecoder<Season> = objectDecoder((fields) => ({
  startDate: fields.required('start_date', decodeGameDate),
  endDate: fields.required('end_date', decodeGameDate),
  hsvNorth: fields.required('hsv_north', decodeHsv),
  colorBalanceNorth: fields.required('colorbalance_north', decodeHsv),
  hsvCenter: fields.required('hsv_center', decodeHsv),
  colorBalanceCenter: fields.required('colorbalance_center', decodeHsv),
  hsvSouth: fields.required('hsv_south', decodeHsv),
  colorBalanceSouth: fields.required('colorbalance_south', decodeHsv),
}));

export const decodeTreeSeason: ClauseDecoder<TreeSeason> = objectDecoder((fields) => ({
  startDate: fields.required('start_date', decodeGameDate),
  endDate: fields.required('end_date', decodeGameDate),
}));

export const decodeSeasonsDocument = (document: ClauseFieldReader): Seasons => ({
  winter: document.required('winter', decodeSeason),
  spring: document.required('spring', decodeSeason),
  summer: document.required('summer', decodeSeason),
  autumn: document.required('autumn', decodeSeason),
  treeWinter: document.required('tree_winter', decodeTreeSeason),
  treeWinter2: document.required('tree_winter2', decodeTreeSeason),
  treeSpring: document.required('tree_spring', decodeTreeSeason),
  treeSpring2: document.required('tree_spring2', decodeTreeSeason),
  treeSummer: document.required('tree_summer', decodeTreeSeason),
  treeSummer2: document.required('tree_summer2', decodeTreeSeason),
  treeAutumn: document.required('tree_autumn', decodeTreeSeason),
  treeAutumn2: document.required('tree_autumn2', decodeTreeSeason),
});

export function loadSeasons(path: string): Seasons {
  return loadClauseFile(path, decodeSeasonsDocument);
}

function encodeDates(builder: ClauseBlockBuilder, season: TreeSeason): ClauseBlockBuilder {
  return builder.scalar('start_date', formatGameDate(season.startDate)).scalar('end_date', formatGameDate(season.endDate));
}

function encodeSeason(season: Season): ClauseBlock {
  const builder = encodeDates(new ClauseBlockBuilder(), season);
  for (const [property, key] of SEASON_HSV_KEYS) {
    builder.list(key, season[property]);
  }
  return builder.build();
}

export function encodeSeasons(seasons: Seasons): ClauseBlock {
  const document = new ClauseBlockBuilder();
  for (const [property, key] of SEASON_KEYS) {
    document.field(key, encodeSeason(seasons[property]));
  }
  for (const [property, key] of TREE_SEASON_KEYS) {
    document.field(key, encodeDates(new ClauseBlockBuilder(), seasons[property]).build());
  }
  return document.build();
}

export const formatSeasons = (seasons: Seasons): string => formatClauseDocument(encodeSeasons(seasons));

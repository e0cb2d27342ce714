import {
  parseAdjacencyRuleName,
  parseBlue,
  parseBuildingId,
  parseBuildingsMaxLevelFactor,
  parseClauseBoolean,
  parseColorIndex,
  parseContinentName,
  parseCountryTag,
  parseDayMonth,
  parseDistance,
  parseFiniteFloat,
  parseGameDate,
  parseGreen,
  parseI32,
  parseLocalSupplies,
  parseManpower,
  parseMeshId,
  parsePixelDensity,
  parsePixelStep,
  parseProvinceId,
  parseRed,
  parseSnowLevel,
  parseStateCategoryName,
  parseStateId,
  parseStateName,
  parseStrategicRegionId,
  parseStrategicRegionName,
  parseTemperature,
  parseTreeIndex,
  parseVictoryPoints,
  parseWeight,
} from '../kernel/scalars.js';
import type { Color, Hsv } from '../kernel/scalars.js';
import { clauseDecodeError, fixedListOf, scalarDecoder } from './clause-decoder.js';
import type { ClauseDecoder } from './clause-decoder.js';
import type { ClauseNode } from './clause-parser.js';

export const decodeI32 = scalarDecoder((text) => parseI32(text));
export const decodeFiniteFloat = scalarDecoder((text) => parseFiniteFloat(text));
export const decodeYesNo = scalarDecoder(parseClauseBoolean);

export const decodeProvinceId = scalarDecoder(parseProvinceId);
export const decodeStateId = scalarDecoder(parseStateId);
export const decodeStrategicRegionId = scalarDecoder(parseStrategicRegionId);
export const decodeColorIndex = scalarDecoder(parseColorIndex);
export const decodeTreeIndex = scalarDecoder(parseTreeIndex);
export const decodeManpower = scalarDecoder(parseManpower);
export const decodePixelStep = scalarDecoder(parsePixelStep);
export const decodeWeight = scalarDecoder(parseWeight);
export const decodeTemperature = scalarDecoder(parseTemperature);
export const decodeSnowLevel = scalarDecoder(parseSnowLevel);
export const decodeVictoryPoints = scalarDecoder(parseVictoryPoints);
export const decodeLocalSupplies = scalarDecoder(parseLocalSupplies);
export const decodeBuildingsMaxLevelFactor = scalarDecoder(parseBuildingsMaxLevelFactor);
export const decodePixelDensity = scalarDecoder(parsePixelDensity);
export const decodeDistance = scalarDecoder(parseDistance);

export const decodeContinentName = scalarDecoder(parseContinentName);
export const decodeAdjacencyRuleName = scalarDecoder(parseAdjacencyRuleName);
export const decodeBuildingId = scalarDecoder(parseBuildingId);
export const decodeStrategicRegionName = scalarDecoder(parseStrategicRegionName);
export const decodeStateName = scalarDecoder(parseStateName);
export const decodeStateCategoryName = scalarDecoder(parseStateCategoryName);
export const decodeCountryTag = scalarDecoder(parseCountryTag);
export const decodeMeshId = scalarDecoder(parseMeshId);

export const decodeDayMonth = scalarDecoder(parseDayMonth);
export const decodeGameDate = scalarDecoder(parseGameDate);

const decodeRed = scalarDecoder(parseRed);
const decodeGreen = scalarDecoder(parseGreen);
const decodeBlue = scalarDecoder(parseBlue);

const decodeNode: ClauseDecoder<ClauseNode> = (node) => node;

function decodeTripleNodes(node: ClauseNode, path: string): readonly [ClauseNode, ClauseNode, ClauseNode] {
  const [first, second, third] = fixedListOf(decodeNode, 3)(node, path);
  if (first === undefined || second === undefined || third === undefined) {
    throw clauseDecodeError(`${path}: expected 3 values.`, node.line);
  }
  return [first, second, third];
}

export function tripleOf<T>(decodeItem: ClauseDecoder<T>): ClauseDecoder<readonly [T, T, T]> {
  return (node, path) => {
    const [first, second, third] = decodeTripleNodes(node, path);
    return [decodeItem(first, `${path}[0]`), decodeItem(second, `${path}[1]`), decodeItem(third, `${path}[2]`)];
  };
}

/** `{ r g b }`, optionally tagged `rgb`. */
export const decodeColor: ClauseDecoder<Color> = (node, path) => {
  if (node.kind === 'block' && node.tag !== undefined && node.tag !== 'rgb') {
    throw clauseDecodeError(`${path}: expected an rgb color, found "${node.tag}".`, node.line);
  }
  const [r, g, b] = decodeTripleNodes(node, path);
  return {
    r: decodeRed(r, `${path}[0]`),
    g: decodeGreen(g, `${path}[1]`),
    b: decodeBlue(b, `${path}[2]`),
  };
};

export const decodeHsv: ClauseDecoder<Hsv> = tripleOf(decodeFiniteFloat);

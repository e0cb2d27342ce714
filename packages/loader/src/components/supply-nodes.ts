import type { ProvinceId } from '../kernel/branded.js';
import { MapLoadError, withFileLocation } from '../kernel/map-load-error.js';
import { parseProvinceId } from '../kernel/scalars.js';
import { contentLines, readUtf8Text, whitespaceTokens } from '../grammar/source-files.js';

export const SUPPLY_NODE_MARKER = '1';

/** `1 <province>`: the leading token is a fixed marker. */
export function parseSupplyNodeLine(line: string): ProvinceId {
  const tokens = whitespaceTokens(line);
  const [marker, provinceText] = tokens;
  if (tokens.length !== 2 || marker !== SUPPLY_NODE_MARKER || provinceText === undefined) {
    throw new MapLoadError(
      'SUPPLY_NODE_LINE_INVALID',
      `Invalid supply node "${line}": expected "${SUPPLY_NODE_MARKER} <province id>".`,
    );
  }
  return parseProvinceId(provinceText);
}

export function loadSupplyNodes(path: string): ReadonlySet<ProvinceId> {
  const nodes = new Set<ProvinceId>();
  for (const line of contentLines(readUtf8Text(path))) {
    try {
      nodes.add(parseSupplyNodeLine(line.text));
    } catch (error) {
      throw withFileLocation(error, path, line.number);
    }
  }
  return nodes;
}

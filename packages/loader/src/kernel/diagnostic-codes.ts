export const MAP_DIAGNOSTIC_CODES = Object.freeze({
  DELIMITED_ROW_SKIPPED: 'DELIMITED_ROW_SKIPPED',
  ADJACENCY_RULE_DUPLICATE: 'ADJACENCY_RULE_DUPLICATE',
  STRATEGIC_REGION_FILE_NAME_UNEXPECTED: 'STRATEGIC_REGION_FILE_NAME_UNEXPECTED',
  STRATEGIC_REGION_DUPLICATE: 'STRATEGIC_REGION_DUPLICATE',
  STATE_DUPLICATE: 'STATE_DUPLICATE',
  BUILDING_TYPE_UNDECLARED: 'BUILDING_TYPE_UNDECLARED',
  MAP_SUBLOAD_COMPLETE: 'MAP_SUBLOAD_COMPLETE',
  XREF_PROVINCE_ID_DUPLICATE: 'XREF_PROVINCE_ID_DUPLICATE',
  XREF_PROVINCE_COLOR_DUPLICATE: 'XREF_PROVINCE_COLOR_DUPLICATE',
  XREF_SEA_ADJACENCY_THROUGH_MISSING: 'XREF_SEA_ADJACENCY_THROUGH_MISSING',
  XREF_ADJACENCY_RULE_MISSING: 'XREF_ADJACENCY_RULE_MISSING',
  XREF_TERRAIN_UNDECLARED: 'XREF_TERRAIN_UNDECLARED',
  XREF_CONTINENT_INDEX_OUT_OF_RANGE: 'XREF_CONTINENT_INDEX_OUT_OF_RANGE',
  XREF_RASTER_SIZE_MISMATCH: 'XREF_RASTER_SIZE_MISMATCH',
} as const);

export type MapDiagnosticCode = (typeof MAP_DIAGNOSTIC_CODES)[keyof typeof MAP_DIAGNOSTIC_CODES];

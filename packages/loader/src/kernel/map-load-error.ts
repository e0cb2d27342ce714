export const MAP_LOAD_ERROR_CATEGORIES = Object.freeze({
  FILE_NOT_FOUND: 'io',
  FILE_READ_FAILED: 'io',
  SCALAR_FORMAT_INVALID: 'format',
  CLAUSE_SYNTAX_INVALID: 'format',
  DELIMITED_SYNTAX_INVALID: 'format',
  CLAUSE_DECODE_FAILED: 'structure',
  RECORD_DECODE_FAILED: 'structure',
  STRATEGIC_REGION_ID_INVALID: 'validation',
  STRATEGIC_REGION_NAME_EMPTY: 'validation',
  STRATEGIC_REGION_FILE_NAME_INVALID: 'validation',
  SUPPLY_NODE_LINE_INVALID: 'validation',
  RAILWAY_LINE_INVALID: 'validation',
  STATE_MAP_LINE_INVALID: 'validation',
  KEY_FILE_INVALID: 'validation',
  DECLARED_TYPE_DUPLICATE: 'validation',
  LAYOUT_INVALID: 'validation',
  MAP_SUBLOAD_FAILED: 'assembly',
  RASTER_DECODE_FAILED: 'assembly',
} as const);

export type MapLoadErrorCode = keyof typeof MAP_LOAD_ERROR_CATEGORIES;
export type MapLoadErrorCategory = (typeof MAP_LOAD_ERROR_CATEGORIES)[MapLoadErrorCode];

export interface MapLoadErrorContext {
  readonly filePath?: string;
  readonly line?: number;
  readonly subLoad?: string;
  readonly entityId?: string;
}

export interface MapLoadErrorOptions {
  readonly cause?: unknown;
}

export class MapLoadError extends Error {
  readonly code: MapLoadErrorCode;
  readonly category: MapLoadErrorCategory;
  readonly context: MapLoadErrorContext;

  constructor(
    code: MapLoadErrorCode,
    message: string,
    context: MapLoadErrorContext = {},
    options: MapLoadErrorOptions = {},
  ) {
    super(message, 'cause' in options ? { cause: options.cause } : undefined);
    this.name = 'MapLoadError';
    this.code = code;
    this.category = MAP_LOAD_ERROR_CATEGORIES[code];
    this.context = context;
  }
}

export const isMapLoadError = (error: unknown): error is MapLoadError => error instanceof MapLoadError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Re-throws a failure raised while reading `filePath` with the file (and the
 * line, when known) attached. The original code is kept and the original
 * error becomes the cause. Anything that is not a `MapLoadError` is returned
 * unchanged.
 */
export function withFileLocation(error: unknown, filePath: string, line?: number): unknown {
  if (!(error instanceof MapLoadError) || error.context.filePath !== undefined) {
    return error;
  }
  const resolvedLine = line ?? error.context.line;
  const location = resolvedLine === undefined ? filePath : `${filePath}:${resolvedLine}`;
  return new MapLoadError(
    error.code,
    `${location}: ${error.message}`,
    {
      ...error.context,
      filePath,
      ...(resolvedLine === undefined ? {} : { line: resolvedLine }),
    },
    { cause: error },
  );
}

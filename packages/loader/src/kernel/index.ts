export * from './branded.js';
export * from './diagnostic-codes.js';
export * from './diagnostics.js';
export * from './map-load-error.js';
export * from './scalars.js';

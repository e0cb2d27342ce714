export * from './cross-validate.js';
export * from './load-map.js';
export * from './map-layout.js';
export * from './map-model.js';
export * from './raster.js';

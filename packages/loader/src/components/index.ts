export * from './adjacencies.js';
export * from './adjacency-rules.js';
export * from './buildings.js';
export * from './cities.js';
export * from './colors.js';
export * from './continents.js';
export * from './definitions.js';
export * from './key-catalog.js';
export * from './railways.js';
export * from './seasons.js';
export * from './state-maps.js';
export * from './states.js';
export * from './strategic-regions.js';
export * from './supply-nodes.js';
export * from './unit-stacks.js';
export * from './weather-positions.js';

export * from './default-map.js';

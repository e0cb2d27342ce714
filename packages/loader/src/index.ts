export * from './kernel/index.js';
export * from './grammar/index.js';
export * from './components/index.js';
export * from './manifest/index.js';
export * from './assembly/index.js';

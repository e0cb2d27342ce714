export * from './clause-decoder.js';
export * from './clause-parser.js';
export * from './clause-tokenizer.js';
export * from './clause-writer.js';
export * from './delimited-records.js';
export * from './scalar-decoders.js';
export * from './source-files.js';

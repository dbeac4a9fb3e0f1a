export * from './document.js';
export * from './errors.js';
export * from './merge.js';
export * from './parser.js';

export * from './enums.js';
export * from './company.js';
export * from './search.js';
export * from './founders.js';
export * from './accuracy.js';

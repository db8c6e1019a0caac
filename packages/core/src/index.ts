export * from './discovery/index.js';
export * from './aggregation/index.js';
export * from './quality/index.js';
export * from './history/index.js';
export * from './archive/index.js';
export * from './router/index.js';
export * from './synthesis/index.js';
export * from './pipeline/index.js';

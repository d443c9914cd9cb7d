export * from './evaluation/types.js';
export * from './evaluation/value.js';
export * from './evaluation/counts.js';
export * from './evaluation/comparators/index.js';
export * from './evaluation/record-evaluator.js';
export * from './evaluation/aggregator.js';
export * from './evaluation/report/index.js';
export * from './evaluation/config.js';
export * from './evaluation/loaders/annotations-loader.js';
export * from './evaluation/runner.js';

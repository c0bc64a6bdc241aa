export * from './types.js';
export * from './decisions.js';
export * from './policy.js';
export * from './selection.js';
export * from './discovery.js';
export * from './extractor.js';
export * from './prober.js';
export * from './session.js';
export * from './apply.js';
export * from './revert.js';
export * from './summary.js';
export * from './propagate.js';

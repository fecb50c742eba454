// Router
export * from './router/index.js';

// Evidence bundle
export * from './evidence/index.js';

// Reasoning providers
export * from './providers/index.js';

// Council
export * from './council/index.js';

// Output
export * from './output/index.js';

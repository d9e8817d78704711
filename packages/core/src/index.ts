// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Query
export * from './query/index.js';

// Observability
export * from './observability/index.js';

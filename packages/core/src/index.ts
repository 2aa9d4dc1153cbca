// Types
export * from './types.js';

// Errors
export * from './errors/index.js';

// Hashing
export * from './hash.js';

// Projection rules
export * from './projection.js';

// Schemas
export * from './schemas.js';

// Logging
export * from './logger.js';

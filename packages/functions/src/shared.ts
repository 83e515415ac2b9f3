// Types
export * from './types/api.js';
export * from './types/health-data.js';
export * from './types/health-intelligence.js';

// Schemas
export * from './schemas/index.js';

// Types
export * from './types/rule.js';
export * from './types/config.js';
export * from './types/summary.js';

// Utilities
export * from './utils/glob.js';
export * from './utils/rule.js';
export * from './utils/summary.js';
export * from './utils/config.js';
export * from './utils/tags.js';

// Configuration migrations
export * from './migrations/config-migrations.js';

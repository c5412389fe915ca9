// Utilities
export * from './utils/logger.js';
export * from './utils/error-utils.js';

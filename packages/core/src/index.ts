/**
 * @cubeload/core — Query model, validation schemas, and shared utilities
 */

// Re-export all types
export * from './types.js';

// Re-export schemas
export * from './schemas.js';

// Re-export constructors, serializer and response parser
export * from './model.js';

// Re-export error utilities
export * from './errors.js';

// Re-export logger
export * from './logger.js';

/**
 * Filtering Subsystem
 * Export all filtering-related types and functions
 */

export * from './types.js';
export * from './FilterEngine.js';

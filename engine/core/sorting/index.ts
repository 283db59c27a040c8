/**
 * Sorting Subsystem
 */

export * from './SortEngine.js';

export * from './PivotEngine.js';

export * from './ColumnProjection.js';

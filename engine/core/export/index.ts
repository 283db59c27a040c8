export * from './ExportPlan.js';

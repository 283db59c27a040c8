/**
 * SheetOps Engine - Core Module Exports
 *
 * Main entry point for the tabular pipeline: filter, sort, column, pivot
 * and join engines, the workspace that orchestrates them, and the preset
 * document model.
 */

// Types - export all
export * from './types/index.js';

// Numeric normalisation
export * from './normalize/index.js';

// Engines
export * from './filtering/index.js';
export * from './sorting/index.js';
export * from './columns/index.js';
export * from './pivot/index.js';
export * from './join/index.js';

// Orchestration
export { Workspace, cloneSheet } from './pipeline/Workspace.js';
export type {
  WorkspaceState,
  WorkspaceListener,
  SheetResult,
  SheetFailureReason,
  SheetPatch,
  PivotResult,
  WorkspaceJoinResult,
  DeleteRowsResult,
  ExportOptions,
  PipelineStage,
} from './pipeline/Workspace.js';

// Presets
export * from './preset/index.js';

// Export planning
export * from './export/index.js';

// Automation
export * from './automation/index.js';

/**
 * SheetOps Engine
 *
 * Headless engine for rule-driven tabular processing:
 * - Ordered AND/OR filter rows with numeric normalisation
 * - Grouped multi-key stable sorting
 * - Column ordering, visibility and dedupe that survive schema changes
 * - Pivot tables and multi-key VLOOKUP-style joins
 * - JSON presets and per-identifier batch automation
 *
 * @example
 * ```typescript
 * import { Workspace, createDataset, createFilterRow } from '@sheetops/engine';
 *
 * const workspace = new Workspace();
 * workspace.loadDataset(createDataset([{ Region: 'North', Units: 12 }]));
 *
 * workspace.updateSheet('Sheet1', {
 *   filters: [createFilterRow({ column: 'Units', operator: '>', value: '10' })],
 * });
 *
 * console.log(workspace.derivedView('Sheet1')?.rows);
 * ```
 */

export * from './core/index.js';

/**
 * Sort Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { applySorts, buildSortGroups, compareValues, createSortRow } from './SortEngine.js';
import { createDataset, type CellValue, type Dataset } from '../types/index.js';

function single(values: CellValue[]): Dataset {
  return createDataset(values.map((v) => ({ V: v })), ['V']);
}

function grouped(): Dataset {
  return createDataset([
    { G: 'b', N: 1 },
    { G: 'a', N: 2 },
    { G: 'a', N: 1 },
    { G: 'b', N: 2 },
  ]);
}

function pairs(dataset: Dataset): string[] {
  return dataset.rows.map((row) => `${row.G}${row.N}`);
}

describe('SortEngine - grouping', () => {
  it('should start a new group on OR', () => {
    const groups = buildSortGroups(
      [
        createSortRow({ column: 'G' }),
        createSortRow({ join: 'AND', column: 'N', direction: 'desc' }),
        createSortRow({ join: 'OR', column: 'N' }),
      ],
      ['G', 'N']
    );
    expect(groups).toEqual([
      [
        { column: 'G', direction: 'asc' },
        { column: 'N', direction: 'desc' },
      ],
      [{ column: 'N', direction: 'asc' }],
    ]);
  });

  it('should treat an OR on the first valid row as the seed', () => {
    const groups = buildSortGroups(
      [createSortRow({ column: 'Gone' }), createSortRow({ join: 'OR', column: 'G' })],
      ['G']
    );
    expect(groups).toEqual([[{ column: 'G', direction: 'asc' }]]);
  });
});

describe('SortEngine - applySorts', () => {
  it('should sort numbers ascending and descending', () => {
    expect(applySorts(single([3, 1, 2]), [createSortRow({ column: 'V' })]).rows.map((r) => r.V)).toEqual([1, 2, 3]);
    expect(
      applySorts(single([3, 1, 2]), [createSortRow({ column: 'V', direction: 'desc' })]).rows.map((r) => r.V)
    ).toEqual([3, 2, 1]);
  });

  it('should keep blanks last in both directions', () => {
    const asc = applySorts(single([2, null, '', 5]), [createSortRow({ column: 'V' })]);
    expect(asc.rows.map((r) => r.V)).toEqual([2, 5, null, '']);

    const desc = applySorts(single([2, null, '', 5]), [createSortRow({ column: 'V', direction: 'desc' })]);
    expect(desc.rows.map((r) => r.V)).toEqual([5, 2, null, '']);
  });

  it('should order numbers before text before booleans', () => {
    const result = applySorts(single(['b', 3, true, 'A', null, 1]), [createSortRow({ column: 'V' })]);
    expect(result.rows.map((r) => r.V)).toEqual([1, 3, 'A', 'b', true, null]);
  });

  it('should compare text case-insensitively with numeric collation', () => {
    const result = applySorts(single(['item10', 'item2', 'Item1']), [createSortRow({ column: 'V' })]);
    expect(result.rows.map((r) => r.V)).toEqual(['Item1', 'item2', 'item10']);
  });

  it('should sort by every key of one AND group', () => {
    const result = applySorts(grouped(), [
      createSortRow({ column: 'G' }),
      createSortRow({ join: 'AND', column: 'N' }),
    ]);
    expect(pairs(result)).toEqual(['a1', 'a2', 'b1', 'b2']);
  });

  it('should give the first group precedence over later groups', () => {
    const result = applySorts(grouped(), [
      createSortRow({ column: 'G' }),
      createSortRow({ join: 'OR', column: 'N', direction: 'desc' }),
    ]);
    expect(pairs(result)).toEqual(['a2', 'a1', 'b2', 'b1']);
  });

  it('should be stable for equal keys', () => {
    const result = applySorts(grouped(), [createSortRow({ column: 'G' })]);
    expect(pairs(result)).toEqual(['a2', 'a1', 'b1', 'b2']);
  });

  it('should return the dataset unchanged when no key applies', () => {
    const dataset = grouped();
    expect(applySorts(dataset, [])).toBe(dataset);
    expect(applySorts(dataset, [createSortRow({ column: 'Missing' })])).toBe(dataset);
  });

  it('should reuse row objects', () => {
    const dataset = grouped();
    const result = applySorts(dataset, [createSortRow({ column: 'N' })]);
    expect(result.rows[0]).toBe(dataset.rows[0]);
    expect(result.rows).toHaveLength(4);
  });
});

describe('SortEngine - compareValues', () => {
  it('should put TRUE before FALSE', () => {
    expect(compareValues(true, false)).toBeLessThan(0);
    expect(compareValues(false, false)).toBe(0);
  });
});

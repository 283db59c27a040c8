/**
 * Filter Engine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  applyFilters,
  buildFilterMask,
  compareNumbers,
  createFilterRow,
  describeFilterRow,
  evaluateFilterRow,
} from './FilterEngine.js';
import { createDataset, type Dataset } from '../types/index.js';

// ===========================================================================
// Fixtures
// ===========================================================================

function numbers(): Dataset {
  return createDataset([1, 2, 3, 4, 5].map((a) => ({ A: a })));
}

function people(): Dataset {
  return createDataset([
    { Name: 'Alice', Dept: 'Sales', Score: '85%', Target: '80%' },
    { Name: 'Bob', Dept: 'Support', Score: '1,200', Target: '1,200' },
    { Name: 'Carol', Dept: 'sales', Score: null, Target: '50' },
    { Name: 'Dan', Dept: 'Ops', Score: 'n/a', Target: '10' },
  ]);
}

function values(dataset: Dataset, column: string) {
  return dataset.rows.map((row) => row[column]);
}

// ===========================================================================
// Relational operators
// ===========================================================================

describe('FilterEngine - relational', () => {
  it('should combine two numeric rows with AND', () => {
    const result = applyFilters(numbers(), [
      createFilterRow({ column: 'A', operator: '>', value: '2' }),
      createFilterRow({ join: 'AND', column: 'A', operator: '<', value: '5' }),
    ]);
    expect(values(result, 'A')).toEqual([3, 4]);
  });

  it('should combine rows with OR', () => {
    const result = applyFilters(numbers(), [
      createFilterRow({ column: 'A', operator: '<', value: '2' }),
      createFilterRow({ join: 'OR', column: 'A', operator: '>=', value: '5' }),
    ]);
    expect(values(result, 'A')).toEqual([1, 5]);
  });

  it('should fold left to right without grouping', () => {
    // (A == 1 OR A == 2) AND A == 2 -> [2]; grouping by OR would give [1, 2]
    const result = applyFilters(numbers(), [
      createFilterRow({ column: 'A', operator: '==', value: '1' }),
      createFilterRow({ join: 'OR', column: 'A', operator: '==', value: '2' }),
      createFilterRow({ join: 'AND', column: 'A', operator: '==', value: '2' }),
    ]);
    expect(values(result, 'A')).toEqual([2]);
  });

  it('should compare against the column average', () => {
    const result = applyFilters(numbers(), [
      createFilterRow({ column: 'A', operator: '>', value: 'Column Average' }),
    ]);
    expect(values(result, 'A')).toEqual([4, 5]);
  });

  it('should match the average sentinel case-insensitively', () => {
    const result = applyFilters(numbers(), [
      createFilterRow({ column: 'A', operator: '<=', value: 'column average' }),
    ]);
    expect(values(result, 'A')).toEqual([1, 2, 3]);
  });

  it('should exclude everything when the average is undefined', () => {
    const dataset = createDataset([{ A: 'x' }, { A: null }]);
    const mask = evaluateFilterRow(dataset, createFilterRow({ column: 'A', operator: '<', value: 'Column Average' }));
    expect(mask).toEqual([false, false]);
  });

  it('should normalize percent and comma formatted cells', () => {
    const result = applyFilters(people(), [
      createFilterRow({ column: 'Score', operator: '>', value: '100' }),
    ]);
    expect(values(result, 'Name')).toEqual(['Bob']);
  });

  it('should compare strings when the literal is not numeric', () => {
    const equal = applyFilters(people(), [createFilterRow({ column: 'Dept', operator: '==', value: 'Sales' })]);
    expect(values(equal, 'Name')).toEqual(['Alice']);

    const notEqual = applyFilters(people(), [createFilterRow({ column: 'Dept', operator: '!=', value: 'Sales' })]);
    expect(values(notEqual, 'Name')).toEqual(['Bob', 'Carol', 'Dan']);
  });

  it('should exclude everything for ordering operators on text literals', () => {
    const result = applyFilters(people(), [createFilterRow({ column: 'Dept', operator: '>', value: 'M' })]);
    expect(result.rows).toEqual([]);
  });

  it('should let missing cells pass only the != operator', () => {
    const gt = applyFilters(people(), [createFilterRow({ column: 'Score', operator: '>', value: '0' })]);
    expect(values(gt, 'Name')).toEqual(['Alice', 'Bob']);

    const ne = applyFilters(people(), [createFilterRow({ column: 'Score', operator: '!=', value: '85' })]);
    expect(values(ne, 'Name')).toEqual(['Bob', 'Carol', 'Dan']);
  });
});

// ===========================================================================
// Text and column operators
// ===========================================================================

describe('FilterEngine - text and column operators', () => {
  it('should match contains case-insensitively', () => {
    const result = applyFilters(people(), [createFilterRow({ column: 'Dept', operator: 'contains', value: 'SAL' })]);
    expect(values(result, 'Name')).toEqual(['Alice', 'Carol']);
  });

  it('should never match contains on a missing cell', () => {
    const dataset = createDataset([{ A: null }, { A: '' }, { A: 'x' }]);
    const mask = evaluateFilterRow(dataset, createFilterRow({ column: 'A', operator: 'contains', value: '' }));
    expect(mask).toEqual([false, true, true]);
  });

  it('should test membership against a comma list', () => {
    const result = applyFilters(people(), [
      createFilterRow({ column: 'Name', operator: 'in', value: 'Bob, Dan ,,Zed' }),
    ]);
    expect(values(result, 'Name')).toEqual(['Bob', 'Dan']);
  });

  it('should compare membership on string form', () => {
    const result = applyFilters(numbers(), [createFilterRow({ column: 'A', operator: 'in', value: '2,4' })]);
    expect(values(result, 'A')).toEqual([2, 4]);
  });

  it('should compare two columns by string form', () => {
    const equal = applyFilters(people(), [
      createFilterRow({ column: 'Score', operator: 'column-equals', compareColumn: 'Target' }),
    ]);
    expect(values(equal, 'Name')).toEqual(['Bob']);

    const different = applyFilters(people(), [
      createFilterRow({ column: 'Score', operator: 'column-not-equals', compareColumn: 'Target' }),
    ]);
    expect(values(different, 'Name')).toEqual(['Alice', 'Carol', 'Dan']);
  });

  it('should fall back to value for the comparison column', () => {
    const result = applyFilters(people(), [
      createFilterRow({ column: 'Score', operator: 'column-equals', value: 'Target' }),
    ]);
    expect(values(result, 'Name')).toEqual(['Bob']);
  });
});

// ===========================================================================
// Skipping policy
// ===========================================================================

describe('FilterEngine - skipping', () => {
  it('should return the dataset unchanged without valid rows', () => {
    const dataset = numbers();
    expect(applyFilters(dataset, [])).toBe(dataset);
    expect(applyFilters(dataset, [createFilterRow({ column: 'Missing', operator: '>', value: '1' })])).toBe(dataset);
    expect(applyFilters(dataset, [createFilterRow()])).toBe(dataset);
  });

  it('should ignore rows on absent columns when combining', () => {
    const result = applyFilters(numbers(), [
      createFilterRow({ column: 'Gone', operator: '==', value: '1' }),
      createFilterRow({ join: 'OR', column: 'A', operator: '==', value: '3' }),
    ]);
    expect(values(result, 'A')).toEqual([3]);
  });

  it('should skip column operators whose comparison column is absent', () => {
    const mask = buildFilterMask(people(), [
      createFilterRow({ column: 'Score', operator: 'column-equals', compareColumn: 'Nope' }),
    ]);
    expect(mask).toBeNull();
  });

  it('should keep row identity and order', () => {
    const dataset = numbers();
    const result = applyFilters(dataset, [createFilterRow({ column: 'A', operator: '>', value: '3' })]);
    expect(result.rows[0]).toBe(dataset.rows[3]);
    expect(result.columns).toEqual(['A']);
  });

  it('should allow filtering down to zero rows', () => {
    const result = applyFilters(numbers(), [createFilterRow({ column: 'A', operator: '>', value: '99' })]);
    expect(result.rows).toEqual([]);
  });
});

describe('FilterEngine - helpers', () => {
  it('should treat missing numbers as unequal', () => {
    expect(compareNumbers('!=', null, 1)).toBe(true);
    expect(compareNumbers('==', null, 1)).toBe(false);
    expect(compareNumbers('>=', 2, 2)).toBe(true);
  });

  it('should describe filter rows', () => {
    expect(describeFilterRow(createFilterRow({ column: 'A', operator: '>', value: '2' }))).toBe('A > 2');
    expect(describeFilterRow(createFilterRow({ column: 'A', operator: '<', value: 'column average' }))).toBe(
      'A < Column Average'
    );
    expect(describeFilterRow(createFilterRow({ column: 'A', operator: 'column-equals', compareColumn: 'B' }))).toBe(
      'A equals column B'
    );
  });
});

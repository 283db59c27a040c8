/**
 * Pivot Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { aggregate, buildPivot, createPivotSpec, isPivotAggregation } from './PivotEngine.js';
import { createDataset, type Dataset } from '../types/index.js';

function sales(): Dataset {
  return createDataset([
    { Region: 'North', Product: 'A', Units: '10', Price: 5 },
    { Region: 'South', Product: 'B', Units: 4, Price: 2 },
    { Region: 'North', Product: 'B', Units: '1,000', Price: null },
    { Region: 'North', Product: 'A', Units: 6, Price: 'x' },
    { Region: null, Product: 'A', Units: 99, Price: 1 },
  ]);
}

describe('PivotEngine - layout', () => {
  it('should count rows per group without values', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'] }));
    expect(result).toEqual({
      columns: ['Region', 'Count'],
      rows: [
        { Region: 'North', Count: 3 },
        { Region: 'South', Count: 1 },
      ],
    });
  });

  it('should name value columns after the value', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'], values: ['Units', 'Price'] }));
    expect(result).toEqual({
      columns: ['Region', 'Units', 'Price'],
      rows: [
        { Region: 'North', Units: 1016, Price: 5 },
        { Region: 'South', Units: 4, Price: 2 },
      ],
    });
  });

  it('should spread values across column keys', () => {
    const result = buildPivot(
      sales(),
      createPivotSpec({ rows: ['Region'], columns: ['Product'], values: ['Units'] })
    );
    expect(result).toEqual({
      columns: ['Region', 'Units | A', 'Units | B'],
      rows: [
        { Region: 'North', 'Units | A': 16, 'Units | B': 1000 },
        { Region: 'South', 'Units | A': 0, 'Units | B': 4 },
      ],
    });
  });

  it('should count per column key without values', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'], columns: ['Product'] }));
    expect(result).toEqual({
      columns: ['Region', 'A', 'B'],
      rows: [
        { Region: 'North', A: 2, B: 1 },
        { Region: 'South', A: 0, B: 1 },
      ],
    });
  });

  it('should order numeric keys numerically', () => {
    const dataset = createDataset([{ K: 10 }, { K: 9 }, { K: 100 }, { K: 9 }]);
    const result = buildPivot(dataset, createPivotSpec({ rows: ['K'] }));
    expect(result?.rows).toEqual([
      { K: 9, Count: 2 },
      { K: 10, Count: 1 },
      { K: 100, Count: 1 },
    ]);
  });

  it('should group by several row keys', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region', 'Product'], values: ['Units'] }));
    expect(result?.rows).toEqual([
      { Region: 'North', Product: 'A', Units: 16 },
      { Region: 'North', Product: 'B', Units: 1000 },
      { Region: 'South', Product: 'B', Units: 4 },
    ]);
  });
});

describe('PivotEngine - header collisions', () => {
  const regions = () =>
    createDataset([
      { Region: 'E', Kind: 'Region' },
      { Region: 'E', Kind: 'x' },
      { Region: 'W', Kind: 'Region' },
    ]);

  it('should not aggregate a row key over itself', () => {
    const result = buildPivot(regions(), createPivotSpec({ rows: ['Region'], values: ['Region'], aggregation: 'count' }));
    expect(result).toEqual({
      columns: ['Region', 'Count'],
      rows: [
        { Region: 'E', Count: 2 },
        { Region: 'W', Count: 1 },
      ],
    });
  });

  it('should rename a column-key header that matches a row key', () => {
    const result = buildPivot(regions(), createPivotSpec({ rows: ['Region'], columns: ['Kind'] }));
    expect(result).toEqual({
      columns: ['Region', 'Region (2)', 'x'],
      rows: [
        { Region: 'E', 'Region (2)': 1, x: 1 },
        { Region: 'W', 'Region (2)': 1, x: 0 },
      ],
    });
  });
});

describe('PivotEngine - aggregations', () => {
  it('should count non-missing raw cells', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'], values: ['Price'], aggregation: 'count' }));
    expect(result?.rows).toEqual([
      { Region: 'North', Price: 2 },
      { Region: 'South', Price: 1 },
    ]);
  });

  it('should average normalized numbers only', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'], values: ['Units'], aggregation: 'mean' }));
    expect(result?.rows[0].Units).toBeCloseTo(1016 / 3);
  });

  it('should compute min and max', () => {
    const min = buildPivot(sales(), createPivotSpec({ rows: ['Region'], values: ['Units'], aggregation: 'min' }));
    const max = buildPivot(sales(), createPivotSpec({ rows: ['Region'], values: ['Units'], aggregation: 'max' }));
    expect(min?.rows[0].Units).toBe(6);
    expect(max?.rows[0].Units).toBe(1000);
  });

  it('should read undefined aggregates as zero', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'], values: ['Product'], aggregation: 'mean' }));
    expect(result?.rows.map((row) => row.Product)).toEqual([0, 0]);
    expect(aggregate(undefined, 'max')).toBe(0);
  });
});

describe('PivotEngine - selection', () => {
  it('should return null without an existing row key', () => {
    expect(buildPivot(sales(), createPivotSpec())).toBeNull();
    expect(buildPivot(sales(), createPivotSpec({ rows: ['Nope'] }))).toBeNull();
  });

  it('should ignore absent value and column names', () => {
    const result = buildPivot(sales(), createPivotSpec({ rows: ['Region'], columns: ['Gone'], values: ['Nope'] }));
    expect(result?.columns).toEqual(['Region', 'Count']);
  });

  it('should keep the count column on an empty dataset', () => {
    const result = buildPivot(createDataset([], ['Region']), createPivotSpec({ rows: ['Region'] }));
    expect(result).toEqual({ columns: ['Region', 'Count'], rows: [] });
  });

  it('should recognise aggregation names', () => {
    expect(isPivotAggregation('mean')).toBe(true);
    expect(isPivotAggregation('median')).toBe(false);
  });
});

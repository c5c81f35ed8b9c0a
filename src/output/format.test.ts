/**
 * Result Formatter Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  sortImporters,
  formatCount,
  formatImporterTable,
  formatImporterJson,
  isSortOrder,
  isOutputFormat,
} from './format.js';
import type { PackageImporter } from '../workers/types.js';

const importers: PackageImporter[] = [
  { path: 'net/http', count: 900 },
  { path: 'fmt', count: 2000 },
  { path: 'io', count: 2000 },
  { path: 'bufio', count: 15 },
];

describe('sortImporters', () => {
  it('should sort by name', () => {
    expect(sortImporters(importers, 'name').map((i) => i.path)).toEqual([
      'bufio',
      'fmt',
      'io',
      'net/http',
    ]);
  });

  it('should sort by count descending with ties by name', () => {
    expect(sortImporters(importers, 'count').map((i) => i.path)).toEqual([
      'fmt',
      'io',
      'net/http',
      'bufio',
    ]);
  });

  it('should not mutate the input', () => {
    sortImporters(importers, 'name');
    expect(importers[0]?.path).toBe('net/http');
  });
});

describe('formatCount', () => {
  it.each([
    [0, '0'],
    [999, '999'],
    [1000, '1,000'],
    [6136, '6,136'],
    [1533321, '1,533,321'],
  ])('%d -> %s', (count, expected) => {
    expect(formatCount(count)).toBe(expected);
  });
});

describe('formatImporterTable', () => {
  it('should pad paths to at least 20 characters', () => {
    expect(formatImporterTable([{ path: 'io', count: 1533321 }])).toEqual([
      'io                   1,533,321',
    ]);
  });

  it('should widen the column to the longest path', () => {
    const lines = formatImporterTable([
      { path: 'golang.org/x/tools/go/analysis', count: 6136 },
      { path: 'io', count: 7 },
    ]);

    expect(lines).toEqual([
      'golang.org/x/tools/go/analysis 6,136',
      'io                             7',
    ]);
  });

  it('should render nothing for an empty list', () => {
    expect(formatImporterTable([])).toEqual([]);
  });
});

describe('formatImporterJson', () => {
  it('should render path and count fields', () => {
    expect(JSON.parse(formatImporterJson([{ path: 'io', count: 3 }]))).toEqual([
      { path: 'io', count: 3 },
    ]);
  });
});

describe('type guards', () => {
  it('should accept known values only', () => {
    expect(isSortOrder('count')).toBe(true);
    expect(isSortOrder('size')).toBe(false);
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('csv')).toBe(false);
  });
});

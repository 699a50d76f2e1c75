import { describe, it, expect } from 'vitest';
import { csvFileName, toCsv } from '../utils/csv';

describe('toCsv', () => {
  it('writes a header row and quotes fields that contain commas', () => {
    const csv = toCsv([{ id: 1, name: 'Desk, oak', price: null }], ['id', 'name', 'price']);

    expect(csv).toBe('id,name,price\n1,"Desk, oak",\n');
  });

  it('follows the given column order', () => {
    const csv = toCsv([{ b: 2, a: 1 }], ['a', 'b']);

    expect(csv).toBe('a,b\n1,2\n');
  });
});

describe('csvFileName', () => {
  it('stamps the file name with the local date and time', () => {
    expect(csvFileName(new Date(2025, 10, 8, 9, 5, 3))).toBe('query_results_20251108_090503.csv');
  });
});

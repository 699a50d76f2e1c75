import { stringify } from 'csv-stringify/sync';
import type { ResultRow } from '../types';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Download name used for every exported result set, e.g. `query_results_20251118_093015.csv`.
 */
export function csvFileName(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `query_results_${date}_${time}.csv`;
}

export function toCsv(rows: ResultRow[], columns: string[]): string {
  return stringify(rows, { header: true, columns });
}

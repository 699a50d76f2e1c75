// Shared types used across all modules

export type ExportFormat = 'json' | 'csv';

export type ResultRow = Record<string, unknown>;

export interface QueryStats {
  rowCount: number;
  columnCount: number;
  sizeKb: number;
}

export interface QueryResult<T = ResultRow> {
  columns: string[];
  rows: T[];
  stats: QueryStats;
}

import { Response } from 'express';
import { ResponseHandler } from './responses';
import { csvFileName, toCsv } from '../utils/csv';
import type { ExportFormat, QueryResult, ResultRow } from '../types';

// Query strings are validated by exportFormatSchema before they get here
export const readExportFormat = (query: unknown): ExportFormat =>
    typeof query === 'object' && query !== null && 'format' in query && query.format === 'csv' ? 'csv' : 'json';

export function sendQueryResult<T extends ResultRow>(
    res: Response,
    result: QueryResult<T>,
    format: ExportFormat,
    message: string
) {
    if (format === 'csv') {
        return ResponseHandler.csv(res, toCsv(result.rows, result.columns), csvFileName());
    }
    return ResponseHandler.success(res, result, message);
}

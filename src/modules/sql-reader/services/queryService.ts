import Database from 'better-sqlite3';
import type { QueryResult, ResultRow } from '../../../shared/types';

export class QueryRejectedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'QueryRejectedError';
    }
}

const toKb = (bytes: number): number => Math.round((bytes / 1024) * 100) / 100;

export class QueryService {
    constructor(private db: Database.Database) { }

    /**
     * Runs one read-only statement. Text that is not exactly one statement,
     * statements that return no rows and statements that would write are
     * rejected before they run; engine errors are rethrown as is.
     */
    execute<T extends ResultRow = ResultRow>(sql: string): QueryResult<T> {
        if (!sql.trim()) {
            throw new QueryRejectedError('Query is empty');
        }

        const stmt = this.prepare<T>(sql);

        if (!stmt.reader) {
            throw new QueryRejectedError('Only queries that return rows can be executed');
        }
        if (!stmt.readonly) {
            throw new QueryRejectedError('Only read-only queries can be executed');
        }

        const columns = stmt.columns().map(column => column.name);
        const rows = stmt.all();

        return {
            columns,
            rows,
            stats: {
                rowCount: rows.length,
                columnCount: columns.length,
                sizeKb: toKb(Buffer.byteLength(JSON.stringify(rows), 'utf-8')),
            },
        };
    }

    // better-sqlite3 reports comment-only and multi-statement text as RangeError
    private prepare<T>(sql: string): Database.Statement<unknown[], T> {
        try {
            return this.db.prepare<unknown[], T>(sql);
        } catch (error) {
            if (error instanceof RangeError && error.message.includes('no statements')) {
                throw new QueryRejectedError('Query contains no statements');
            }
            if (error instanceof RangeError && error.message.includes('more than one statement')) {
                throw new QueryRejectedError('Only one statement can be executed at a time');
            }
            throw error;
        }
    }
}

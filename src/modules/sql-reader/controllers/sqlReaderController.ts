import { Request, Response } from 'express';
import { SqlFileService } from '../services/sqlFileService';
import { QueryRejectedError, QueryService } from '../services/queryService';
import { ResponseHandler } from '../../../shared/responses/responses';
import { readExportFormat, sendQueryResult } from '../../../shared/responses/queryResult';
import type { ExecuteQueryInput } from '../validations/querySchema';

export class SqlReaderController {
    constructor(
        private sqlFileService: SqlFileService,
        private queryService: QueryService
    ) { }

    async listSqlFiles(_req: Request, res: Response): Promise<void> {
        try {
            const files = await this.sqlFileService.listSqlFiles();
            ResponseHandler.success(res, { directory: this.sqlFileService.directory, files }, 'SQL files fetched successfully');
        } catch (error) {
            console.error('Error listing SQL files:', error);
            ResponseHandler.fromError(res, error, 'Failed to list SQL files');
        }
    }

    async getSqlFile(req: Request, res: Response): Promise<void> {
        try {
            const file = await this.sqlFileService.readSqlFile(req.params.name);
            if (!file) {
                ResponseHandler.notFound(res, `SQL file '${req.params.name}' not found`);
                return;
            }
            ResponseHandler.success(res, file, 'SQL file fetched successfully');
        } catch (error) {
            console.error('Error reading SQL file:', error);
            ResponseHandler.fromError(res, error, 'Failed to read SQL file');
        }
    }

    async executeSqlFile(req: Request, res: Response): Promise<void> {
        try {
            const file = await this.sqlFileService.readSqlFile(req.params.name);
            if (!file) {
                ResponseHandler.notFound(res, `SQL file '${req.params.name}' not found`);
                return;
            }
            const result = this.queryService.execute(file.content);
            sendQueryResult(res, result, readExportFormat(req.query), 'Query executed successfully');
        } catch (error) {
            this.handleQueryError(res, error, `Error executing SQL file ${req.params.name}:`);
        }
    }

    async executeQuery(req: Request<{}, unknown, ExecuteQueryInput>, res: Response): Promise<void> {
        try {
            const result = this.queryService.execute(req.body.sql);
            sendQueryResult(res, result, readExportFormat(req.query), 'Query executed successfully');
        } catch (error) {
            this.handleQueryError(res, error, 'Error executing query:');
        }
    }

    private handleQueryError(res: Response, error: unknown, context: string): void {
        if (error instanceof QueryRejectedError) {
            ResponseHandler.badRequest(res, error.message);
            return;
        }
        console.error(context, error);
        ResponseHandler.fromError(res, error, 'Failed to execute query');
    }
}

import { Response } from 'express';
import Database from 'better-sqlite3';

export interface ApiResponse<T = unknown> {
    success: boolean;
    message: string;
    data?: T;
    error?: ErrorDetail;
}

export interface ErrorDetail {
    code: string;
    details?: unknown;
    stack?: string; // Only in development
}

export enum ErrorCodes {
    // Validation Errors (400)
    VALIDATION_ERROR = 'VALIDATION_ERROR',
    INVALID_INPUT = 'INVALID_INPUT',

    // Not Found Errors (404)
    NOT_FOUND = 'NOT_FOUND',

    // Server Errors (500)
    INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
    DATABASE_ERROR = 'DATABASE_ERROR',
}

// ============================================
// Response Helper Class
// ============================================

export class ResponseHandler {

    // Success Response
    static success<T>(
        res: Response,
        data: T,
        message: string = 'Success',
        statusCode: number = 200
    ) {
        const response: ApiResponse<T> = {
            success: true,
            message,
            data,
        };

        return res.status(statusCode).json(response);
    }

    // Created Response (201)
    static created<T>(
        res: Response,
        data: T,
        message: string = 'Resource created successfully'
    ) {
        return this.success(res, data, message, 201);
    }

    // CSV attachment
    static csv(res: Response, body: string, fileName: string) {
        res.setHeader('Content-Type', 'text/csv; charset=utf-8');
        res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
        return res.status(200).send(body);
    }

    // Error Response
    static error(
        res: Response,
        message: string,
        statusCode: number = 500,
        errorCode: ErrorCodes = ErrorCodes.INTERNAL_SERVER_ERROR,
        details?: unknown
    ) {
        const response: ApiResponse = {
            success: false,
            message,
            error: {
                code: errorCode,
                details,
                stack: process.env.NODE_ENV === 'development' ? new Error().stack : undefined,
            }
        };

        return res.status(statusCode).json(response);
    }

    // Bad Request (400)
    static badRequest(res: Response, message: string = 'Bad request', details?: unknown) {
        return this.error(res, message, 400, ErrorCodes.INVALID_INPUT, details);
    }

    // Validation Error (400)
    static validationError(res: Response, details: unknown, message: string = 'Validation failed') {
        return this.error(res, message, 400, ErrorCodes.VALIDATION_ERROR, details);
    }

    // Not Found (404)
    static notFound(res: Response, message: string = 'Resource not found') {
        return this.error(res, message, 404, ErrorCodes.NOT_FOUND);
    }

    // Internal Server Error (500)
    static internalError(res: Response, message: string = 'Internal server error', details?: unknown) {
        return this.error(res, message, 500, ErrorCodes.INTERNAL_SERVER_ERROR, details);
    }

    // Database Error (500)
    static databaseError(res: Response, message: string = 'Database error occurred', details?: unknown) {
        return this.error(res, message, 500, ErrorCodes.DATABASE_ERROR, details);
    }

    // Engine errors keep their SQLite code, everything else is a plain 500
    static fromError(res: Response, error: unknown, fallbackMessage: string) {
        if (error instanceof Database.SqliteError) {
            return this.databaseError(res, error.message, { code: error.code });
        }
        const message = error instanceof Error && error.message ? error.message : fallbackMessage;
        return this.internalError(res, message);
    }
}

import { z } from 'zod';
import { isSqlFileName } from '../services/sqlFileService';

export const executeQuerySchema = z.object({
  sql: z.string().trim().min(1, 'SQL query is required'),
});

export const sqlFileParamsSchema = z.object({
  name: z.string().refine(isSqlFileName, 'File name must be a plain .sql file name'),
});

export type ExecuteQueryInput = z.infer<typeof executeQuerySchema>;

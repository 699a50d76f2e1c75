import express from 'express';
import Database from 'better-sqlite3';
import type { AppConfig } from './config/app.config';
import { ResponseHandler } from './shared/responses/responses';

import {
  ProductModel,
  SaleModel,
  SampleDataService,
  SampleDataController,
  createSampleDataRoutes,
} from './modules/catalog';
import {
  SqlFileService,
  QueryService,
  SqlReaderController,
  createQueryRoutes,
  createSqlFileRoutes,
} from './modules/sql-reader';
import { ReportService, ReportController, createReportRoutes } from './modules/reports';

export interface AppDependencies {
  db: Database.Database;
  config: Pick<AppConfig, 'sqlDir'>;
}

export function createApp({ db, config }: AppDependencies): express.Express {
  const app = express();

  // Initialize models
  const productModel = new ProductModel(db);
  const saleModel = new SaleModel(db);

  // Initialize services
  const sampleDataService = new SampleDataService(db, productModel, saleModel);
  const sqlFileService = new SqlFileService(config.sqlDir);
  const queryService = new QueryService(db);
  const reportService = new ReportService(sqlFileService, queryService);

  // Initialize controllers
  const sampleDataController = new SampleDataController(sampleDataService);
  const sqlReaderController = new SqlReaderController(sqlFileService, queryService);
  const reportController = new ReportController(reportService);

  // Middleware
  app.use(express.json());

  // Routes
  app.use('/api/reports', createReportRoutes(reportController));
  app.use('/api/sql-files', createSqlFileRoutes(sqlReaderController));
  app.use('/api/queries', createQueryRoutes(sqlReaderController));
  app.use('/api/sample-data', createSampleDataRoutes(sampleDataController));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  // 404 handler
  app.use('*', (_req, res) => {
    ResponseHandler.notFound(res, 'Route not found');
  });

  // Error handling middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isBodyParseError(err)) {
      ResponseHandler.badRequest(res, 'Request body is not valid JSON');
      return;
    }
    console.error('Unhandled error:', err);
    ResponseHandler.internalError(res, 'Internal server error');
  });

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

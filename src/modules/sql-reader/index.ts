// Export services
export { SqlFileService } from './services/sqlFileService';
export { QueryService } from './services/queryService';

// Export controllers
export { SqlReaderController } from './controllers/sqlReaderController';

// Export routes
export { createSqlFileRoutes, createQueryRoutes } from './routes/sqlReaderRoutes';

// Export services
export { ReportService } from './services/reportService';

// Export controllers
export { ReportController } from './controllers/reportController';

// Export routes
export { createReportRoutes } from './routes/reportRoutes';

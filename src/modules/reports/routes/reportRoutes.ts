import { Router } from 'express';
import { ReportController } from '../controllers/reportController';
import validate from '../../../shared/validate';
import { exportFormatSchema } from '../../../shared/validations/exportSchema';

export function createReportRoutes(reportController: ReportController): Router {
  const router = Router();

  router.get('/', (req, res) => reportController.listReports(req, res));

  // One route per report, each backed by its own SQL file
  router.get('/sales-summary', validate(exportFormatSchema, 'query'), (req, res) =>
    reportController.getReport('sales-summary', req, res));
  router.get('/high-value-products', validate(exportFormatSchema, 'query'), (req, res) =>
    reportController.getReport('high-value-products', req, res));
  router.get('/products', validate(exportFormatSchema, 'query'), (req, res) =>
    reportController.getReport('products', req, res));

  return router;
}

import { Request, Response } from 'express';
import { ReportService } from '../services/reportService';
import { ResponseHandler } from '../../../shared/responses/responses';
import { readExportFormat, sendQueryResult } from '../../../shared/responses/queryResult';
import { REPORTS, ReportSlug } from '../types';

export class ReportController {
  constructor(private reportService: ReportService) {}

  async listReports(_req: Request, res: Response): Promise<void> {
    try {
      ResponseHandler.success(res, this.reportService.listReports(), 'Reports fetched successfully');
    } catch (error) {
      console.error('Error listing reports:', error);
      ResponseHandler.fromError(res, error, 'Failed to list reports');
    }
  }

  async getReport(slug: ReportSlug, req: Request, res: Response): Promise<void> {
    try {
      const result = await this.reportService.runReport(slug);
      sendQueryResult(res, result, readExportFormat(req.query), `${REPORTS[slug].title} fetched successfully`);
    } catch (error) {
      console.error(`Error running report ${slug}:`, error);
      ResponseHandler.fromError(res, error, 'Failed to run report');
    }
  }
}

import { SqlFileService } from '../../sql-reader/services/sqlFileService';
import { QueryService } from '../../sql-reader/services/queryService';
import type { QueryResult } from '../../../shared/types';
import {
  REPORTS,
  ReportDefinition,
  ReportRows,
  ReportSlug,
  HighValueProductRow,
  ProductListingRow,
  SalesSummaryRow,
} from '../types';

export class ReportService {
  constructor(
    private sqlFileService: SqlFileService,
    private queryService: QueryService
  ) {}

  listReports(): ReportDefinition[] {
    return Object.values(REPORTS);
  }

  /**
   * Loads the report's SQL file on every call so edits to the file apply
   * without a restart.
   */
  async runReport<K extends ReportSlug>(slug: K): Promise<QueryResult<ReportRows[K]>> {
    const report = REPORTS[slug];
    const file = await this.sqlFileService.readSqlFile(report.file);
    if (!file) {
      throw new Error(`Report query ${report.file} not found in ${this.sqlFileService.directory}`);
    }
    return this.queryService.execute<ReportRows[K]>(file.content);
  }

  async getSalesSummary(): Promise<SalesSummaryRow[]> {
    return (await this.runReport('sales-summary')).rows;
  }

  async getHighValueProducts(): Promise<HighValueProductRow[]> {
    return (await this.runReport('high-value-products')).rows;
  }

  async getAllProducts(): Promise<ProductListingRow[]> {
    return (await this.runReport('products')).rows;
  }
}

import { Request, Response } from 'express';
import { SampleDataService } from '../services/sampleDataService';
import { ResponseHandler } from '../../../shared/responses/responses';

export class SampleDataController {
    constructor(private sampleDataService: SampleDataService) { }

    async createSampleData(_req: Request, res: Response): Promise<void> {
        try {
            const result = this.sampleDataService.createSampleData();
            console.log(`Sample data created: ${result.products} products, ${result.sales} sales`);
            ResponseHandler.created(res, result, 'Sample database created successfully');
        } catch (error) {
            console.error('Error creating sample data:', error);
            ResponseHandler.fromError(res, error, 'Failed to create sample data');
        }
    }
}

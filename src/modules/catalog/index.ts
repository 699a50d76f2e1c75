// Export models
export { ProductModel } from './models/Product';
export { SaleModel } from './models/Sale';

// Export services
export { SampleDataService } from './services/sampleDataService';

// Export controllers
export { SampleDataController } from './controllers/sampleDataController';

// Export routes
export { createSampleDataRoutes } from './routes/sampleDataRoutes';

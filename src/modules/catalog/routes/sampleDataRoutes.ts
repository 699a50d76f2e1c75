import { Router } from 'express';
import { SampleDataController } from '../controllers/sampleDataController';

export const createSampleDataRoutes = (controller: SampleDataController): Router => {
    const router = Router();

    router.post('/', (req, res) => controller.createSampleData(req, res));

    return router;
};

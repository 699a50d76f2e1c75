import { Router } from 'express';
import { SqlReaderController } from '../controllers/sqlReaderController';
import validate from '../../../shared/validate';
import { exportFormatSchema } from '../../../shared/validations/exportSchema';
import { executeQuerySchema, sqlFileParamsSchema } from '../validations/querySchema';

export const createSqlFileRoutes = (controller: SqlReaderController): Router => {
    const router = Router();

    router.get('/', (req, res) => controller.listSqlFiles(req, res));
    router.get('/:name', validate(sqlFileParamsSchema, 'params'), (req, res) => controller.getSqlFile(req, res));
    router.post(
        '/:name/execute',
        validate(sqlFileParamsSchema, 'params'),
        validate(exportFormatSchema, 'query'),
        (req, res) => controller.executeSqlFile(req, res)
    );

    return router;
};

export const createQueryRoutes = (controller: SqlReaderController): Router => {
    const router = Router();

    router.post(
        '/',
        validate(exportFormatSchema, 'query'),
        validate(executeQuerySchema),
        (req, res) => controller.executeQuery(req, res)
    );

    return router;
};

// src/routes/health.routes.ts
import express, { Router } from 'express';
import { createHealthController } from '../controllers/health.controller';
import { asyncHandler } from '../middlewares/error.middleware';
import { AppServices } from '../services/container';

export const createHealthRoutes = ({ database, config }: AppServices): Router => {
  const router: Router = express.Router();
  const healthController = createHealthController(database, config.database);

  router.get('/', asyncHandler(healthController.root));
  router.get('/test', asyncHandler(healthController.status));

  return router;
};

// src/routes/checkout.routes.ts
import express, { Router } from 'express';
import { createCheckoutController } from '../controllers/checkout.controller';
import { asyncHandler } from '../middlewares/error.middleware';
import { validateCheckout } from '../middlewares/validation.middleware';
import { AppServices } from '../services/container';

export const createCheckoutRoutes = ({ checkout }: AppServices): Router => {
  const router: Router = express.Router();
  const checkoutController = createCheckoutController(checkout);

  router.post('/session', validateCheckout, asyncHandler(checkoutController.createSession));

  return router;
};

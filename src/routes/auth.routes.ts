// src/routes/auth.routes.ts
import express, { Router } from 'express';
import { createAuthController } from '../controllers/auth.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { asyncHandler } from '../middlewares/error.middleware';
import { validateOtpRequest, validateOtpVerification } from '../middlewares/validation.middleware';
import { AppServices } from '../services/container';

export const createAuthRoutes = ({ otp, tokens }: AppServices): Router => {
  const router: Router = express.Router();
  const authController = createAuthController(otp);

  router.post('/auth/request-otp', validateOtpRequest, asyncHandler(authController.requestOtp));
  router.post('/auth/verify-otp', validateOtpVerification, asyncHandler(authController.verifyOtp));
  router.get('/me', createAuthMiddleware(tokens), asyncHandler(authController.me));

  return router;
};

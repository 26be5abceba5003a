// src/routes/profile.routes.ts
import express, { Router } from 'express';
import { createProfileController } from '../controllers/profile.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { asyncHandler } from '../middlewares/error.middleware';
import { validateProfile, validateProfileEmailParam, validateSearch } from '../middlewares/validation.middleware';
import { AppServices } from '../services/container';

export const createProfileRoutes = ({ profiles, tokens }: AppServices): Router => {
  const router: Router = express.Router();
  const profileController = createProfileController(profiles);

  router.post('/profile', createAuthMiddleware(tokens), validateProfile, asyncHandler(profileController.upsert));
  router.get('/profile/:email', validateProfileEmailParam, asyncHandler(profileController.getByEmail));
  router.get('/search', validateSearch, asyncHandler(profileController.search));

  return router;
};

// src/routes/admin.routes.ts
import express, { Router } from 'express';
import { createAdminController } from '../controllers/admin.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { isAdmin } from '../middlewares/role.middleware';
import { asyncHandler } from '../middlewares/error.middleware';
import { validateAdminVerify, validateProfileEmailParam } from '../middlewares/validation.middleware';
import { AppServices } from '../services/container';

export const createAdminRoutes = ({ profiles, messages, tokens, config }: AppServices): Router => {
  const router: Router = express.Router();
  const adminController = createAdminController(profiles, messages);

  // Apply auth and admin middleware to all routes
  router.use(createAuthMiddleware(tokens), isAdmin(config.adminEmails));

  router.get('/users', asyncHandler(adminController.getAllUsers));
  router.post('/verify', validateAdminVerify, asyncHandler(adminController.setVerified));
  router.delete('/users/:email', validateProfileEmailParam, asyncHandler(adminController.deleteUser));

  return router;
};

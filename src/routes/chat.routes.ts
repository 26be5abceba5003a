// src/routes/chat.routes.ts
import express, { Router } from 'express';
import { createChatController } from '../controllers/chat.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { asyncHandler } from '../middlewares/error.middleware';
import { validateHistoryQuery, validateMessage } from '../middlewares/validation.middleware';
import { AppServices } from '../services/container';

export const createChatRoutes = ({ messages, tokens }: AppServices): Router => {
  const router: Router = express.Router();
  const chatController = createChatController(messages);

  // Every chat route acts as the token holder
  router.use(createAuthMiddleware(tokens));

  router.post('/send', validateMessage, asyncHandler(chatController.send));
  router.get('/history', validateHistoryQuery, asyncHandler(chatController.history));

  return router;
};

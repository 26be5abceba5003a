// src/controllers/chat.controller.ts
import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { MessageRepository } from '../services/message.service';
import { getActor } from '../middlewares/auth.middleware';

export const createChatController = (messages: MessageRepository) => ({
  /**
   * @route   POST /api/chat/send
   * @access  Private
   */
  send: async (req: Request, res: Response): Promise<Response> => {
    const from = getActor(req);
    const { to_email, content } = matchedData(req, { locations: ['body'] });

    await messages.send(from, to_email, content);
    return res.json({ status: 'sent' });
  },

  /**
   * @route   GET /api/chat/history?with=<email>
   * @desc    Conversation between the caller and one peer, oldest first
   * @access  Private
   */
  history: async (req: Request, res: Response): Promise<Response> => {
    const self = getActor(req);
    const { with: peer } = matchedData(req, { locations: ['query'] });

    const conversation = await messages.history(self, peer);
    return res.json({ messages: conversation });
  }
});

// src/controllers/admin.controller.ts
import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { ProfileRepository } from '../services/profile.service';
import { MessageRepository } from '../services/message.service';
import { NotFoundError } from '../utils/errors';

export const createAdminController = (profiles: ProfileRepository, messages: MessageRepository) => ({
  /**
   * @route   GET /api/admin/users
   * @access  Admin
   */
  getAllUsers: async (req: Request, res: Response): Promise<Response> => {
    const users = await profiles.list();
    return res.json({ users });
  },

  /**
   * @route   POST /api/admin/verify
   * @desc    Mark a profile as verified (or not)
   * @access  Admin
   */
  setVerified: async (req: Request, res: Response): Promise<Response> => {
    const { email, verified } = matchedData(req, { locations: ['body'] });
    const found = await profiles.setVerified(email, verified);
    if (!found) {
      throw new NotFoundError('Profile not found');
    }
    console.log(`Admin set is_verified=${verified} for ${email}`);
    return res.json({ status: 'ok' });
  },

  /**
   * @route   DELETE /api/admin/users/:email
   * @desc    Remove a profile and every message it sent or received
   * @access  Admin
   */
  deleteUser: async (req: Request, res: Response): Promise<Response> => {
    const { email } = matchedData(req, { locations: ['params'] });
    await profiles.remove(email);
    const removedMessages = await messages.removeFor(email);
    console.log(`Admin deleted ${email} and ${removedMessages} messages`);
    return res.json({ status: 'deleted' });
  }
});

// src/controllers/profile.controller.ts
import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { ProfileInput, ProfileRepository } from '../services/profile.service';
import { getActor } from '../middlewares/auth.middleware';
import { NotFoundError } from '../utils/errors';

export const createProfileController = (profiles: ProfileRepository) => ({
  /**
   * @route   POST /api/profile
   * @desc    Create or update the caller's profile. The email always comes
   *          from the token, whatever the body says.
   * @access  Private
   */
  upsert: async (req: Request, res: Response): Promise<Response> => {
    const email = getActor(req);
    const data = matchedData(req, { locations: ['body'] });
    const input: ProfileInput = {
      name: data.name,
      agency: data.agency,
      position: data.position,
      grade: data.grade,
      current_region: data.current_region,
      desired_region: data.desired_region
    };
    if (typeof data.nip === 'string' && data.nip.length > 0) {
      input.nip = data.nip;
    }

    const status = await profiles.upsert(email, input);
    return res.json({ status });
  },

  /**
   * @route   GET /api/profile/:email
   * @access  Public
   */
  getByEmail: async (req: Request, res: Response): Promise<Response> => {
    const { email } = matchedData(req, { locations: ['params'] });
    const profile = await profiles.findByEmail(email);
    if (!profile) {
      throw new NotFoundError('Profile not found');
    }
    return res.json(profile);
  },

  /**
   * @route   GET /api/search
   * @desc    Find counterparts by desired region, current region or agency
   * @access  Public
   */
  search: async (req: Request, res: Response): Promise<Response> => {
    const { desired_region, current_region, agency } = matchedData(req, { locations: ['query'] });
    const results = await profiles.search({ desired_region, current_region, agency });
    return res.json({ results });
  }
});

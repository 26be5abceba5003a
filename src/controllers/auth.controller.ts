// src/controllers/auth.controller.ts
import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { OtpService } from '../services/otp.service';
import { getActor } from '../middlewares/auth.middleware';

export const createAuthController = (otp: OtpService) => ({
  /**
   * @route   POST /api/auth/request-otp
   * @desc    Send a one-time passcode to the given email
   * @access  Public
   */
  requestOtp: async (req: Request, res: Response): Promise<Response> => {
    const { email } = matchedData(req, { locations: ['body'] });
    const { expiresAt } = await otp.request(email);

    return res.json({
      status: 'ok',
      message: 'A sign-in code has been sent to your email',
      expires_at: expiresAt
    });
  },

  /**
   * @route   POST /api/auth/verify-otp
   * @desc    Exchange email + passcode for a bearer token
   * @access  Public
   */
  verifyOtp: async (req: Request, res: Response): Promise<Response> => {
    const { email, code } = matchedData(req, { locations: ['body'] });
    const accessToken = await otp.verify(email, code);

    return res.json({
      access_token: accessToken,
      token_type: 'bearer',
      email
    });
  },

  /**
   * @route   GET /api/me
   * @desc    The email bound to the presented token
   * @access  Private
   */
  me: async (req: Request, res: Response): Promise<Response> => {
    return res.json({ email: getActor(req) });
  }
});

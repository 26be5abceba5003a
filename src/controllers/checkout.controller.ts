// src/controllers/checkout.controller.ts
import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { CheckoutProvider } from '../services/checkout.service';

export const createCheckoutController = (checkout: CheckoutProvider) => ({
  /**
   * @route   POST /api/checkout/session
   * @desc    Start a monthly subscription checkout for the email
   * @access  Public
   */
  createSession: async (req: Request, res: Response): Promise<Response> => {
    const { email } = matchedData(req, { locations: ['body'] });
    const session = await checkout.createSubscriptionSession(email);
    return res.json({ id: session.id, url: session.url });
  }
});

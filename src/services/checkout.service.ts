// src/services/checkout.service.ts
import Stripe from 'stripe';
import { PaymentError, ServiceUnavailableError } from '../utils/errors';

// Rp50.000 per month, in the smallest currency unit Stripe expects for IDR
export const SUBSCRIPTION_PLAN = {
  currency: 'idr',
  unitAmount: 5_000_000,
  name: 'Region Swap Subscription',
  description: 'Access to search, matching and chat',
} as const;

export interface CheckoutSession {
  id: string;
  url: string | null;
}

export interface CheckoutProvider {
  createSubscriptionSession(email: string): Promise<CheckoutSession>;
}

/** The slice of the Stripe client this service touches. */
export interface CheckoutSessionsApi {
  create(params: Stripe.Checkout.SessionCreateParams): Promise<CheckoutSession>;
}

export class StripeCheckoutProvider implements CheckoutProvider {
  constructor(
    private readonly sessions: CheckoutSessionsApi | null,
    private readonly frontendUrl: string
  ) {}

  async createSubscriptionSession(email: string): Promise<CheckoutSession> {
    if (!this.sessions) {
      throw new ServiceUnavailableError('Stripe not configured');
    }

    const params: Stripe.Checkout.SessionCreateParams = {
      mode: 'subscription',
      payment_method_types: ['card'],
      customer_email: email,
      line_items: [
        {
          price_data: {
            currency: SUBSCRIPTION_PLAN.currency,
            product_data: {
              name: SUBSCRIPTION_PLAN.name,
              description: SUBSCRIPTION_PLAN.description,
            },
            unit_amount: SUBSCRIPTION_PLAN.unitAmount,
            recurring: { interval: 'month' },
          },
          quantity: 1,
        },
      ],
      success_url: `${this.frontendUrl}/success?session_id={CHECKOUT_SESSION_ID}`,
      cancel_url: `${this.frontendUrl}/`,
    };

    try {
      const session = await this.sessions.create(params);
      console.log(`✅ Checkout session created for ${email}: ${session.id}`);
      return { id: session.id, url: session.url };
    } catch (error) {
      console.error('Error creating checkout session:', error);
      throw new PaymentError(error instanceof Error ? error.message : 'Failed to create checkout session');
    }
  }
}

export const createCheckoutProvider = (secretKey: string, frontendUrl: string): CheckoutProvider => {
  if (!secretKey) {
    console.warn('⚠️  STRIPE_SECRET_KEY is not set, checkout is disabled');
    return new StripeCheckoutProvider(null, frontendUrl);
  }
  const stripe = new Stripe(secretKey);
  return new StripeCheckoutProvider(stripe.checkout.sessions, frontendUrl);
};

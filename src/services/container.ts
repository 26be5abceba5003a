// src/services/container.ts
import { AppConfig } from '../config/env';
import { createMailTransport } from '../config/email';
import { DatabaseProbe, mongooseProbe } from '../config/db';
import { MongoPasscodeStore } from './passcode.store';
import { TokenService } from './token.service';
import { OtpService } from './otp.service';
import { ConsoleNotifier, EmailNotifier, Notifier } from './notifier';
import { MongoProfileRepository, ProfileRepository } from './profile.service';
import { MongoMessageRepository, MessageRepository } from './message.service';
import { CheckoutProvider, createCheckoutProvider } from './checkout.service';

/**
 * Everything a request handler may touch. Built once at startup; tests build
 * their own with in-memory stand-ins.
 */
export interface AppServices {
  config: Readonly<AppConfig>;
  tokens: TokenService;
  otp: OtpService;
  profiles: ProfileRepository;
  messages: MessageRepository;
  checkout: CheckoutProvider;
  database: DatabaseProbe;
}

const createNotifier = (config: Readonly<AppConfig>): Notifier => {
  if (config.notifier === 'console') {
    console.log('📨 Passcodes will be printed to the console (NOTIFIER=console)');
    return new ConsoleNotifier();
  }
  const transporter = createMailTransport(config.email, config.env !== 'test');
  return new EmailNotifier(transporter, config.email.from);
};

export const createServices = (config: Readonly<AppConfig>): AppServices => {
  const tokens = new TokenService(config.auth.jwtSecret, config.auth.tokenTtlSeconds);
  const otp = new OtpService(new MongoPasscodeStore(), tokens, createNotifier(config), {
    ttlSeconds: config.auth.otpTtlSeconds,
  });

  return {
    config,
    tokens,
    otp,
    profiles: new MongoProfileRepository(),
    messages: new MongoMessageRepository(),
    checkout: createCheckoutProvider(config.stripe.secretKey, config.frontendUrl),
    database: mongooseProbe,
  };
};

// src/services/otp.service.ts
import { randomInt } from 'crypto';
import { PasscodeStore, DuplicatePasscodeError } from './passcode.store';
import { TokenService } from './token.service';
import { Notifier } from './notifier';
import { Clock, systemClock } from '../utils/clock';
import { CodeExpiredError, InvalidCodeError, ServiceUnavailableError } from '../utils/errors';

const PASSCODE_SPACE = 1_000_000;
const PASSCODE_LENGTH = 6;
const MAX_ISSUE_ATTEMPTS = 3;

/**
 * Uniform over 000000..999999.
 */
export const generatePasscode = (): string =>
  randomInt(0, PASSCODE_SPACE).toString().padStart(PASSCODE_LENGTH, '0');

export interface IssuedPasscode {
  code: string;
  expiresAt: number;
}

export interface OtpServiceOptions {
  ttlSeconds: number;
  clock?: Clock;
  generate?: () => string;
}

export class OtpService {
  private readonly ttlSeconds: number;
  private readonly clock: Clock;
  private readonly generate: () => string;

  constructor(
    private readonly store: PasscodeStore,
    private readonly tokens: TokenService,
    private readonly notifier: Notifier,
    options: OtpServiceOptions
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? systemClock;
    this.generate = options.generate ?? generatePasscode;
  }

  /**
   * Replace whatever code the email had with a fresh one.
   *
   * The store holds a unique index on email, so two concurrent issues cannot
   * both leave a record behind: the loser sees a duplicate, clears the
   * winner's record and tries again. Last writer wins.
   */
  async issue(email: string): Promise<IssuedPasscode> {
    for (let attempt = 1; attempt <= MAX_ISSUE_ATTEMPTS; attempt++) {
      const code = this.generate();
      const expiresAt = this.clock() + this.ttlSeconds;

      await this.store.invalidate(email);
      try {
        await this.store.insert({ email, code, purpose: 'login', expires_at: expiresAt });
        return { code, expiresAt };
      } catch (err) {
        if (!(err instanceof DuplicatePasscodeError)) throw err;
        console.warn(`Concurrent passcode issue for ${email}, retrying (attempt ${attempt})`);
      }
    }
    throw new ServiceUnavailableError('Could not issue a passcode, please try again');
  }

  /**
   * Issue a code and hand it to the notifier. The code itself is not returned.
   */
  async request(email: string): Promise<{ expiresAt: number }> {
    const { code, expiresAt } = await this.issue(email);
    await this.notifier.sendPasscode(email, code, expiresAt);
    console.log(`Passcode issued for ${email}`);
    return { expiresAt };
  }

  /**
   * Exchange a code for a session token. Any terminal outcome (success or
   * expiry) removes every record for the email.
   */
  async verify(email: string, code: string): Promise<string> {
    const record = await this.store.findMatch(email, code);
    if (!record) {
      throw new InvalidCodeError();
    }

    if (this.clock() > record.expires_at) {
      await this.store.invalidate(email);
      console.log(`Expired passcode presented for ${email}`);
      throw new CodeExpiredError();
    }

    // A concurrent verify may have consumed it between lookup and here
    const consumed = await this.store.consume(record.id);
    if (!consumed) {
      throw new InvalidCodeError();
    }
    await this.store.invalidate(email);

    console.log(`Passcode verified for ${email}`);
    return this.tokens.mint(email);
  }
}

// src/services/token.service.ts
import jwt, { JwtPayload } from 'jsonwebtoken';
import { ConfigError, UnauthenticatedError } from '../utils/errors';
import { Clock, systemClock } from '../utils/clock';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Stateless HS256 session tokens. Nothing is stored server side, so a token
 * stays valid until it expires.
 */
export class TokenService {
  constructor(
    private readonly secret: string,
    private readonly ttlSeconds: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!secret) {
      throw new ConfigError('A signing secret is required');
    }
  }

  /**
   * Sign a token whose subject is the verified email.
   */
  mint(email: string): string {
    const issuedAt = this.clock();
    return jwt.sign({ iat: issuedAt }, this.secret, {
      algorithm: 'HS256',
      subject: email,
      expiresIn: this.ttlSeconds,
    });
  }

  /**
   * Check signature and expiry and return the subject. Expiry is exclusive:
   * a token is still accepted in the very second it expires.
   */
  verify(token: string): string {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTimestamp: this.clock(),
        // jsonwebtoken rejects at now >= exp; one second of tolerance makes it now > exp
        clockTolerance: 1,
      });
    } catch {
      throw new UnauthenticatedError();
    }

    if (typeof decoded === 'string' || typeof decoded.exp !== 'number') {
      throw new UnauthenticatedError();
    }
    if (typeof decoded.sub !== 'string' || decoded.sub.length === 0) {
      throw new UnauthenticatedError();
    }
    return decoded.sub;
  }

  /**
   * Authenticate a raw Authorization header value.
   */
  authenticate(header: string | undefined): string {
    if (!header) {
      throw new UnauthenticatedError();
    }
    const match = BEARER_PATTERN.exec(header.trim());
    if (!match) {
      throw new UnauthenticatedError();
    }
    return this.verify(match[1]);
  }
}

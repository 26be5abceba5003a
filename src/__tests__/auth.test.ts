// src/__tests__/auth.test.ts
import request from 'supertest';
import jwt from 'jsonwebtoken';
import { buildTestApp, TestHarness } from './helpers/testApp';

const EMAIL = 'a@x.com';

describe('OTP login flow', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = buildTestApp();
  });

  const requestCode = (email: string) =>
    request(harness.app).post('/api/auth/request-otp').send({ email });

  const verifyCode = (email: string, code: string) =>
    request(harness.app).post('/api/auth/verify-otp').send({ email, code });

  describe('POST /api/auth/request-otp', () => {
    it('sends the code out of band and keeps it out of the response', async () => {
      const response = await requestCode(EMAIL);

      expect(response.statusCode).toBe(200);
      expect(response.body).toEqual({
        status: 'ok',
        message: 'A sign-in code has been sent to your email',
        expires_at: harness.clock.now + 600
      });
      expect(harness.notifier.sent).toHaveLength(1);
      expect(harness.notifier.sent[0].email).toBe(EMAIL);
      expect(harness.notifier.sent[0].code).toMatch(/^\d{6}$/);
    });

    it('trims and lowercases the email before issuing', async () => {
      await requestCode('  A@X.com ');

      expect(harness.notifier.sent[0].email).toBe(EMAIL);
      expect(harness.store.outstanding(EMAIL)).toHaveLength(1);
    });

    it('rejects a malformed email', async () => {
      const response = await requestCode('not-an-email');

      expect(response.statusCode).toBe(400);
      expect(response.body).toEqual({
        message: 'Validation failed',
        error: 'ValidationError',
        errors: [{ field: 'email', message: 'Please provide a valid email' }]
      });
      expect(harness.notifier.sent).toEqual([]);
    });

    it('rejects a missing email', async () => {
      const response = await request(harness.app).post('/api/auth/request-otp').send({});

      expect(response.statusCode).toBe(400);
      expect(response.body.errors[0]).toEqual({ field: 'email', message: 'Email is required' });
    });
  });

  describe('POST /api/auth/verify-otp', () => {
    it('exchanges the code for a bearer token bound to the email', async () => {
      await requestCode(EMAIL);
      const code = harness.notifier.lastCodeFor(EMAIL);

      const response = await verifyCode(EMAIL, code ?? '');

      expect(response.statusCode).toBe(200);
      expect(response.body.token_type).toBe('bearer');
      expect(response.body.email).toBe(EMAIL);
      expect(jwt.decode(response.body.access_token)).toEqual({
        sub: EMAIL,
        iat: harness.clock.now,
        exp: harness.clock.now + 604800
      });
    });

    it('answers InvalidCode for a wrong code', async () => {
      await requestCode(EMAIL);

      const response = await verifyCode(EMAIL, 'wrong1');

      expect(response.statusCode).toBe(400);
      expect(response.body).toEqual({ message: 'Invalid code', error: 'InvalidCode' });
    });

    it('answers InvalidCode when nothing was requested', async () => {
      const response = await verifyCode('nobody@x.com', '123456');

      expect(response.statusCode).toBe(400);
      expect(response.body).toEqual({ message: 'Invalid code', error: 'InvalidCode' });
    });

    it('only lets a code through once', async () => {
      await requestCode(EMAIL);
      const code = harness.notifier.lastCodeFor(EMAIL) ?? '';

      expect((await verifyCode(EMAIL, code)).statusCode).toBe(200);
      const replay = await verifyCode(EMAIL, code);

      expect(replay.statusCode).toBe(400);
      expect(replay.body.error).toBe('InvalidCode');
    });

    it('answers CodeExpired after ten minutes, then InvalidCode', async () => {
      await requestCode(EMAIL);
      const code = harness.notifier.lastCodeFor(EMAIL) ?? '';
      harness.clock.advance(601);

      const expired = await verifyCode(EMAIL, code);
      expect(expired.statusCode).toBe(400);
      expect(expired.body).toEqual({ message: 'Code expired', error: 'CodeExpired' });

      const again = await verifyCode(EMAIL, code);
      expect(again.body.error).toBe('InvalidCode');
    });

    it('rejects a missing code', async () => {
      const response = await request(harness.app).post('/api/auth/verify-otp').send({ email: EMAIL });

      expect(response.statusCode).toBe(400);
      expect(response.body.errors).toEqual([{ field: 'code', message: 'Code is required' }]);
    });
  });

  describe('GET /api/me', () => {
    it('returns the email the token was issued to', async () => {
      await requestCode(EMAIL);
      const login = await verifyCode(EMAIL, harness.notifier.lastCodeFor(EMAIL) ?? '');

      const response = await request(harness.app)
        .get('/api/me')
        .set('Authorization', `Bearer ${login.body.access_token}`);

      expect(response.statusCode).toBe(200);
      expect(response.body).toEqual({ email: EMAIL });
    });

    it('keeps working for the full week and stops one second after', async () => {
      await requestCode(EMAIL);
      const login = await verifyCode(EMAIL, harness.notifier.lastCodeFor(EMAIL) ?? '');
      const header = `Bearer ${login.body.access_token}`;

      harness.clock.advance(604800);
      expect((await request(harness.app).get('/api/me').set('Authorization', header)).statusCode).toBe(200);

      harness.clock.advance(1);
      expect((await request(harness.app).get('/api/me').set('Authorization', header)).statusCode).toBe(401);
    });

    it.each([
      ['no header', undefined],
      ['the Basic scheme', 'Basic dXNlcjpwYXNz'],
      ['a garbage token', 'Bearer garbage'],
    ])('answers 401 Unauthenticated for %s', async (_label, header) => {
      const req = request(harness.app).get('/api/me');
      const response = header ? await req.set('Authorization', header) : await req;

      expect(response.statusCode).toBe(401);
      expect(response.body).toEqual({ message: 'Not authenticated', error: 'Unauthenticated' });
    });
  });
});

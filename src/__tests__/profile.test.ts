// src/__tests__/profile.test.ts
import request from 'supertest';
import { buildTestApp, bearerFor, TestHarness } from './helpers/testApp';
import { escapeRegex } from '../utils/regex';

const profileBody = {
  name: 'Ani Lestari',
  nip: '199001012015032001',
  agency: 'Kementerian Keuangan',
  position: 'Analis Kebijakan',
  grade: 'III/a',
  current_region: 'Jakarta',
  desired_region: 'Surabaya'
};

describe('Profiles and search', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = buildTestApp();
  });

  describe('POST /api/profile', () => {
    it('requires a bearer token', async () => {
      const response = await request(harness.app).post('/api/profile').send(profileBody);

      expect(response.statusCode).toBe(401);
      expect(harness.profiles.profiles.size).toBe(0);
    });

    it('stores the profile under the token email, not the body email', async () => {
      const response = await request(harness.app)
        .post('/api/profile')
        .set('Authorization', bearerFor(harness, 'a@x.com'))
        .send({ ...profileBody, email: 'someone-else@x.com', is_verified: true, is_subscribed: true });

      expect(response.statusCode).toBe(200);
      expect(response.body).toEqual({ status: 'created' });
      expect(harness.profiles.profiles.has('someone-else@x.com')).toBe(false);
      expect(harness.profiles.profiles.get('a@x.com')).toEqual({
        ...profileBody,
        email: 'a@x.com',
        is_subscribed: false,
        is_verified: false
      });
    });

    it('reports an update the second time', async () => {
      const auth = bearerFor(harness, 'a@x.com');
      await request(harness.app).post('/api/profile').set('Authorization', auth).send(profileBody);

      const response = await request(harness.app)
        .post('/api/profile')
        .set('Authorization', auth)
        .send({ ...profileBody, desired_region: 'Makassar' });

      expect(response.body).toEqual({ status: 'updated' });
      expect(harness.profiles.profiles.get('a@x.com')?.desired_region).toBe('Makassar');
    });

    it('accepts a profile without a NIP', async () => {
      const withoutNip: Partial<typeof profileBody> = { ...profileBody };
      delete withoutNip.nip;

      const response = await request(harness.app)
        .post('/api/profile')
        .set('Authorization', bearerFor(harness, 'a@x.com'))
        .send(withoutNip);

      expect(response.statusCode).toBe(200);
      expect(harness.profiles.profiles.get('a@x.com')?.nip).toBeUndefined();
    });

    it('clears a stored NIP when an update leaves it out', async () => {
      const auth = bearerFor(harness, 'a@x.com');
      await request(harness.app).post('/api/profile').set('Authorization', auth).send(profileBody);
      const withoutNip: Partial<typeof profileBody> = { ...profileBody };
      delete withoutNip.nip;

      const response = await request(harness.app).post('/api/profile').set('Authorization', auth).send(withoutNip);

      expect(response.body).toEqual({ status: 'updated' });
      expect(harness.profiles.profiles.get('a@x.com')).toEqual({
        ...withoutNip,
        email: 'a@x.com',
        is_subscribed: false,
        is_verified: false
      });
    });

    it('rejects a profile missing required fields', async () => {
      const incomplete: Partial<typeof profileBody> = { ...profileBody };
      delete incomplete.agency;

      const response = await request(harness.app)
        .post('/api/profile')
        .set('Authorization', bearerFor(harness, 'a@x.com'))
        .send(incomplete);

      expect(response.statusCode).toBe(400);
      expect(response.body.errors).toEqual([{ field: 'agency', message: 'Agency is required' }]);
    });
  });

  describe('GET /api/profile/:email', () => {
    beforeEach(async () => {
      await harness.profiles.upsert('a@x.com', profileBody);
    });

    it('returns the stored profile', async () => {
      const response = await request(harness.app).get('/api/profile/a@x.com');

      expect(response.statusCode).toBe(200);
      expect(response.body).toEqual({ ...profileBody, email: 'a@x.com', is_subscribed: false, is_verified: false });
    });

    it('matches the address case-insensitively', async () => {
      const response = await request(harness.app).get('/api/profile/A@X.COM');

      expect(response.statusCode).toBe(200);
      expect(response.body.email).toBe('a@x.com');
    });

    it('answers 404 for an unknown address', async () => {
      const response = await request(harness.app).get('/api/profile/nobody@x.com');

      expect(response.statusCode).toBe(404);
      expect(response.body).toEqual({ message: 'Profile not found', error: 'NotFound' });
    });
  });

  describe('GET /api/search', () => {
    beforeEach(async () => {
      await harness.profiles.upsert('a@x.com', profileBody);
      await harness.profiles.upsert('b@x.com', {
        ...profileBody,
        name: 'Budi',
        agency: 'Kementerian Agama',
        current_region: 'Surabaya',
        desired_region: 'Jakarta'
      });
    });

    it('filters by desired region ignoring case', async () => {
      const response = await request(harness.app).get('/api/search').query({ desired_region: 'surabaya' });

      expect(response.statusCode).toBe(200);
      expect(response.body.results.map((p: { email: string }) => p.email)).toEqual(['a@x.com']);
    });

    it('combines filters', async () => {
      const response = await request(harness.app)
        .get('/api/search')
        .query({ current_region: 'sura', agency: 'agama' });

      expect(response.body.results.map((p: { email: string }) => p.email)).toEqual(['b@x.com']);
    });

    it('returns everyone without filters', async () => {
      const response = await request(harness.app).get('/api/search');

      expect(response.body.results).toHaveLength(2);
    });

    it('rejects a repeated parameter', async () => {
      const response = await request(harness.app).get('/api/search?agency=a&agency=b');

      expect(response.statusCode).toBe(400);
      expect(response.body.errors).toEqual([{ field: 'agency', message: 'agency must be a single value' }]);
    });
  });
});

describe('escapeRegex', () => {
  it('makes metacharacters literal', () => {
    expect(escapeRegex('Sura.*(baya)')).toBe('Sura\\.\\*\\(baya\\)');
    expect(new RegExp(escapeRegex('Sura.*'), 'i').test('Surabaya')).toBe(false);
    expect(new RegExp(escapeRegex('sura'), 'i').test('Surabaya')).toBe(true);
  });
});

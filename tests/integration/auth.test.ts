import { beforeEach, describe, expect, it } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { Services } from '../../src/container';
import { makeApp } from '../helpers/makeApp';
import { Seeder } from '../helpers/seed';

describe('auth API', () => {
  let app: Express;
  let services: Services;

  beforeEach(() => {
    ({ app, services } = makeApp());
  });

  const register = (body: Record<string, unknown>) => request(app).post('/api/auth/register').send(body);

  describe('POST /api/auth/register', () => {
    it('registers a reader by default and returns a working token', async () => {
      const response = await register({
        username: 'lois',
        password: 'password123',
        email: 'lois@example.com',
        first_name: 'Lois',
        last_name: 'Lane'
      }).expect(201);

      expect(response.body.user).toMatchObject({
        username: 'lois',
        email: 'lois@example.com',
        first_name: 'Lois',
        last_name: 'Lane',
        role: 'reader',
        role_display: 'Reader',
        affiliated_publisher: null,
        social_connection: null
      });
      expect(response.body.user).not.toHaveProperty('password');

      const me = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${response.body.token}`)
        .expect(200);
      expect(me.body.username).toBe('lois');
    });

    it('lets an editor join an existing publisher', async () => {
      const publisher = new Seeder(services).publisher('Daily Planet');

      const response = await register({
        username: 'perry',
        password: 'password123',
        email: 'perry@example.com',
        role: 'editor',
        affiliated_publisher_id: publisher.id
      }).expect(201);

      expect(response.body.user.affiliated_publisher).toEqual({ id: publisher.id, name: 'Daily Planet' });
    });

    it('refuses an affiliation for non-editors', async () => {
      const publisher = new Seeder(services).publisher('Daily Planet');

      const response = await register({
        username: 'clark',
        password: 'password123',
        email: 'clark@example.com',
        role: 'journalist',
        affiliated_publisher_id: publisher.id
      }).expect(400);

      expect(response.body.error.message).toBe('Only editors can be affiliated with a publisher');
    });

    it('rejects a taken username', async () => {
      const body = { username: 'lois', password: 'password123', email: 'lois@example.com' };
      await register(body).expect(201);

      const response = await register(body).expect(409);
      expect(response.body.error.code).toBe('USER_EXISTS');
    });

    it('validates the body', async () => {
      const response = await register({ username: 'lois', password: 'short', email: 'lois@example.com' }).expect(
        400
      );

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('password: Password must be at least 8 characters');
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await register({ username: 'lois', password: 'password123', email: 'lois@example.com' }).expect(201);
    });

    it('returns the user and a token', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'lois', password: 'password123' })
        .expect(200);

      expect(response.body.user.username).toBe('lois');
      expect(typeof response.body.token).toBe('string');
    });

    it('issues a bare token from /api/auth/token', async () => {
      const response = await request(app)
        .post('/api/auth/token')
        .send({ username: 'lois', password: 'password123' })
        .expect(200);

      expect(Object.keys(response.body)).toEqual(['token']);
    });

    it('refuses a wrong password', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'lois', password: 'wrong-password' })
        .expect(401);

      expect(response.body).toEqual({
        error: { code: 'INVALID_CREDENTIALS', message: 'Invalid username or password' }
      });
    });
  });

  describe('authentication', () => {
    it('answers 401 with only the error envelope when no token is sent', async () => {
      const response = await request(app).get('/api/articles/').expect(401);

      expect(response.body).toEqual({ error: { code: 'UNAUTHORIZED', message: 'No token provided' } });
    });

    it('rejects a malformed token', async () => {
      const response = await request(app)
        .get('/api/feed')
        .set('Authorization', 'Bearer not-a-token')
        .expect(401);

      expect(response.body.error.code).toBe('INVALID_TOKEN');
    });

    it('rejects malformed JSON bodies', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"username": ')
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('PATCH /api/auth/me', () => {
    it('updates names and email', async () => {
      const seed = new Seeder(services);
      const reader = seed.reader('r1');

      const response = await request(app)
        .patch('/api/auth/me')
        .set('Authorization', `Bearer ${seed.token(reader)}`)
        .send({ first_name: 'Jimmy', email: 'jimmy@example.com' })
        .expect(200);

      expect(response.body).toMatchObject({ first_name: 'Jimmy', email: 'jimmy@example.com' });
    });

    it('never changes the role', async () => {
      const seed = new Seeder(services);
      const reader = seed.reader('r1');

      await request(app)
        .patch('/api/auth/me')
        .set('Authorization', `Bearer ${seed.token(reader)}`)
        .send({ role: 'editor' })
        .expect(400);

      expect(services.store.getUser(reader.id)?.role).toBe('reader');
    });

    it('lets only editors change their affiliation', async () => {
      const seed = new Seeder(services);
      const publisher = seed.publisher('Daily Planet');
      const reader = seed.reader('r1');
      const editor = seed.editor('perry');

      await request(app)
        .patch('/api/auth/me')
        .set('Authorization', `Bearer ${seed.token(reader)}`)
        .send({ affiliated_publisher_id: publisher.id })
        .expect(403);

      const response = await request(app)
        .patch('/api/auth/me')
        .set('Authorization', `Bearer ${seed.token(editor)}`)
        .send({ affiliated_publisher_id: publisher.id })
        .expect(200);
      expect(response.body.affiliated_publisher).toEqual({ id: publisher.id, name: 'Daily Planet' });
    });
  });
});

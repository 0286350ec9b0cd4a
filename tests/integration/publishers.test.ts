import { beforeEach, describe, expect, it } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { Services } from '../../src/container';
import { User } from '../../src/models/User';
import { makeApp } from '../helpers/makeApp';
import { Seeder } from '../helpers/seed';

describe('publishers, journalists and social API', () => {
  let app: Express;
  let services: Services;
  let seed: Seeder;

  beforeEach(() => {
    ({ app, services } = makeApp());
    seed = new Seeder(services);
  });

  const auth = (user: User) => ({ Authorization: `Bearer ${seed.token(user)}` });

  describe('publishers', () => {
    it('lets an editor create a publisher and joins them to it', async () => {
      const perry = seed.editor('perry');

      const created = await request(app)
        .post('/api/publishers')
        .set(auth(perry))
        .send({ name: '  Daily Planet ', description: 'Metropolis news' })
        .expect(201);
      expect(created.body).toMatchObject({ name: 'Daily Planet', description: 'Metropolis news' });

      const reader = seed.reader('jimmy');
      services.store.transaction((tx) => tx.subscribeToPublisher(reader.id, created.body.id));

      const detail = await request(app).get(`/api/publishers/${created.body.id}`).set(auth(reader)).expect(200);
      expect(detail.body.editors).toEqual([{ id: perry.id, username: 'perry' }]);
      expect(detail.body.subscriber_count).toBe(1);
    });

    it('refuses duplicate names regardless of case', async () => {
      const perry = seed.editor('perry');
      seed.publisher('Daily Planet');

      const response = await request(app)
        .post('/api/publishers')
        .set(auth(perry))
        .send({ name: 'daily planet' })
        .expect(409);

      expect(response.body.error.code).toBe('PUBLISHER_EXISTS');
    });

    it('is created by editors only', async () => {
      const clark = seed.journalist('clark');

      await request(app).post('/api/publishers').set(auth(clark)).send({ name: 'Clark Weekly' }).expect(403);
    });

    it('lists publishers by name', async () => {
      const reader = seed.reader('jimmy');
      seed.publisher('Zeta');
      seed.publisher('Alpha');

      const response = await request(app).get('/api/publishers').set(auth(reader)).expect(200);

      expect(response.body.count).toBe(2);
      expect(response.body.results.map((p: { name: string }) => p.name)).toEqual(['Alpha', 'Zeta']);
    });
  });

  describe('journalists', () => {
    it('lists and shows journalists without private fields', async () => {
      const reader = seed.reader('jimmy');
      const clark = seed.journalist('clark', { firstName: 'Clark', lastName: 'Kent' });
      seed.editor('perry');

      const list = await request(app).get('/api/journalists').set(auth(reader)).expect(200);
      expect(list.body.results.map((j: { username: string }) => j.username)).toEqual(['clark']);

      const detail = await request(app).get(`/api/journalists/${clark.id}`).set(auth(reader)).expect(200);
      expect(detail.body).toMatchObject({ username: 'clark', first_name: 'Clark', role: 'journalist' });
      expect(detail.body).not.toHaveProperty('email');
    });

    it('answers 404 for users who are not journalists', async () => {
      const reader = seed.reader('jimmy');

      await request(app).get(`/api/journalists/${reader.id}`).set(auth(reader)).expect(404);
    });
  });

  describe('social connection', () => {
    it('connects, shows and disconnects an editor account', async () => {
      const perry = seed.editor('perry');

      const connected = await request(app)
        .put('/api/social/connection')
        .set(auth(perry))
        .send({ handle: '@dailyplanet', access_token: 'test-token' })
        .expect(200);
      expect(connected.body).toMatchObject({ connected: true, provider: 'x', handle: 'dailyplanet' });
      expect(connected.body).not.toHaveProperty('access_token');

      const shown = await request(app).get('/api/social/connection').set(auth(perry)).expect(200);
      expect(shown.body.handle).toBe('dailyplanet');

      await request(app).delete('/api/social/connection').set(auth(perry)).expect(200);
      const after = await request(app).get('/api/social/connection').set(auth(perry)).expect(200);
      expect(after.body).toEqual({ connected: false, provider: null, handle: null, connected_at: null });
    });

    it('is for editors only', async () => {
      const reader = seed.reader('jimmy');

      await request(app).get('/api/social/connection').set(auth(reader)).expect(403);
    });
  });

  it('describes the API without authentication', async () => {
    const response = await request(app).get('/api/info').expect(200);

    expect(response.body.api_name).toBe('Newsroom API');
    expect(response.body.authentication.token_endpoint).toBe('/api/auth/token');
    expect(response.body.endpoints.auth.password_reset).toBe('/api/auth/password-reset');
  });
});

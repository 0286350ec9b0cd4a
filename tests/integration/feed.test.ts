import { beforeEach, describe, expect, it } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { Services } from '../../src/container';
import { ApprovalStatus } from '../../src/models/Content';
import { User } from '../../src/models/User';
import { makeApp } from '../helpers/makeApp';
import { Seeder } from '../helpers/seed';

const APPROVED = ApprovalStatus.APPROVED;

describe('feed API', () => {
  let app: Express;
  let services: Services;
  let seed: Seeder;

  beforeEach(() => {
    ({ app, services } = makeApp());
    seed = new Seeder(services);
  });

  const auth = (user: User) => ({ Authorization: `Bearer ${seed.token(user)}` });

  it('builds a reader feed from subscriptions and follows, newest first', async () => {
    const p1 = seed.publisher('P1');
    const p2 = seed.publisher('P2');
    const j1 = seed.journalist('j1');
    const j2 = seed.journalist('j2');
    const j3 = seed.journalist('j3');
    const r1 = seed.reader('r1');
    seed.subscribe(r1, p1);
    seed.follow(r1, j2);

    const a3 = seed.article('A3', { authorId: j2.id, status: APPROVED });
    seed.article('A2', { authorId: j1.id, publisherId: p2.id, status: APPROVED });
    seed.article('A4', { authorId: j3.id, status: APPROVED });
    const a1 = seed.article('A1', { authorId: j1.id, publisherId: p1.id, status: APPROVED });
    seed.article('A5', { authorId: j1.id, publisherId: p1.id });

    const response = await request(app).get('/api/feed').set(auth(r1)).expect(200);

    expect(response.body.articles.map((item: { id: number }) => item.id)).toEqual([a1.id, a3.id]);
    expect(response.body.newsletters).toEqual([]);
    expect(response.body.total_articles).toBe(2);
    expect(response.body.total_newsletters).toBe(0);
  });

  it('shows staff every item, pending included', async () => {
    const j1 = seed.journalist('j1');
    const e1 = seed.editor('e1');
    seed.article('A1', { authorId: j1.id });
    seed.newsletter('N1', { authorId: j1.id });

    const response = await request(app).get('/api/feed').set(auth(e1)).expect(200);

    expect(response.body.total_articles).toBe(1);
    expect(response.body.total_newsletters).toBe(1);
    expect(response.body.newsletters[0]).toMatchObject({ subject: 'N1', status: 'pending' });
  });

  it('lets readers browse every approved item by type', async () => {
    const j1 = seed.journalist('j1');
    const r1 = seed.reader('r1');
    const article = seed.article('A1', { authorId: j1.id, status: APPROVED });
    seed.newsletter('N1', { authorId: j1.id, status: APPROVED });
    seed.article('Draft', { authorId: j1.id });

    const all = await request(app).get('/api/browse').set(auth(r1)).expect(200);
    expect(all.body.count).toBe(2);
    expect(all.body.results.map((item: { kind: string }) => item.kind)).toEqual(['newsletter', 'article']);

    const articles = await request(app).get('/api/browse?type=articles').set(auth(r1)).expect(200);
    expect(articles.body.results.map((item: { id: number }) => item.id)).toEqual([article.id]);

    await request(app).get('/api/browse?type=podcasts').set(auth(r1)).expect(400);
  });

  it('keeps browse for readers', async () => {
    const e1 = seed.editor('e1');

    await request(app).get('/api/browse').set(auth(e1)).expect(403);
  });
});

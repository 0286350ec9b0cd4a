import { beforeEach, describe, expect, it } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { Services } from '../../src/container';
import { ApprovalStatus, ContentKind } from '../../src/models/Content';
import { Journalist, User } from '../../src/models/User';
import { FakeSocialPoster } from '../helpers/fakes';
import { makeApp } from '../helpers/makeApp';
import { Seeder } from '../helpers/seed';

const PNG = Buffer.from('fake-png-bytes');

describe('image attachments', () => {
  let app: Express;
  let services: Services;
  let socialPoster: FakeSocialPoster;
  let seed: Seeder;
  let clark: Journalist;

  beforeEach(() => {
    ({ app, services, socialPoster } = makeApp());
    seed = new Seeder(services);
    clark = seed.journalist('clark');
  });

  const auth = (user: User) => ({ Authorization: `Bearer ${seed.token(user)}` });

  const upload = (user: User, path: string, file: Buffer, contentType: string) =>
    request(app)
      .post(path)
      .set(auth(user))
      .attach('image', file, { filename: 'cover.png', contentType });

  it('attaches an image and serves it through a signed link', async () => {
    const draft = seed.article('Draft', { authorId: clark.id });

    const response = await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'image/png').expect(201);

    expect(response.body).toMatchObject({
      file_name: 'cover.png',
      mime_type: 'image/png',
      size: PNG.length,
      uploaded_by: clark.id
    });
    expect(response.body.article.image_url).toMatch(/^\/api\/files\/[\w-]+\/download\?token=\w+&expires=\d+$/);

    const download = await request(app).get(response.body.download_url).expect(200);
    expect(download.headers['content-type']).toBe('image/png');
    expect(Buffer.compare(download.body, PNG)).toBe(0);
  });

  it('refuses a tampered link', async () => {
    const draft = seed.article('Draft', { authorId: clark.id });
    const response = await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'image/png').expect(201);
    const tampered = response.body.download_url.replace(/token=\w+/, 'token=0000000000000000');

    const denied = await request(app).get(tampered).expect(403);
    expect(denied.body.error.code).toBe('INVALID_SIGNATURE');
  });

  it('replaces the previous image', async () => {
    const draft = seed.article('Draft', { authorId: clark.id });
    const first = await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'image/png').expect(201);
    const second = await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'image/png').expect(201);

    expect(services.store.getContent(ContentKind.ARTICLE, draft.id)?.imageId).toBe(second.body.id);
    expect(services.files.getFile(first.body.id)).toBeUndefined();
  });

  it('drops the image when its article is deleted', async () => {
    const draft = seed.article('Draft', { authorId: clark.id });
    const uploaded = await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'image/png').expect(201);

    await request(app).delete(`/api/articles/${draft.id}`).set(auth(clark)).expect(204);

    expect(services.files.getFile(uploaded.body.id)).toBeUndefined();
    const gone = await request(app).get(uploaded.body.download_url).expect(404);
    expect(gone.body.error.message).toBe('File not found');
  });

  it('accepts images only, within the size limit', async () => {
    const draft = seed.article('Draft', { authorId: clark.id });

    const wrongType = await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'text/plain').expect(400);
    expect(wrongType.body.error.code).toBe('INVALID_FILE_TYPE');

    const tooLarge = await upload(
      clark,
      `/api/articles/${draft.id}/image`,
      Buffer.alloc(services.config.uploads.maxFileSize + 1),
      'image/png'
    ).expect(400);
    expect(tooLarge.body.error.code).toBe('FILE_TOO_LARGE');

    const missing = await request(app).post(`/api/articles/${draft.id}/image`).set(auth(clark)).expect(400);
    expect(missing.body.error.message).toBe('No file uploaded. Use "image" as the field name');
  });

  it('lets only the author attach to a pending item', async () => {
    const lois = seed.journalist('lois');
    const draft = seed.newsletter('Draft', { authorId: clark.id });
    const published = seed.newsletter('Published', { authorId: clark.id, status: ApprovalStatus.APPROVED });

    await upload(lois, `/api/newsletters/${draft.id}/image`, PNG, 'image/png').expect(403);
    await upload(clark, `/api/newsletters/${published.id}/image`, PNG, 'image/png').expect(409);
    expect(services.store.getContent(ContentKind.NEWSLETTER, published.id)?.imageId).toBeNull();
  });

  it('sends the image along with the social post on approval', async () => {
    const perry = seed.editor('perry');
    services.store.transaction((tx) =>
      services.accounts.connectSocial(tx, perry, { handle: 'dailyplanet', accessToken: 'test-token' })
    );
    const draft = seed.article('Draft', { authorId: clark.id });
    await upload(clark, `/api/articles/${draft.id}/image`, PNG, 'image/png').expect(201);

    await request(app).post(`/api/articles/${draft.id}/approve`).set(auth(perry)).expect(200);
    await services.queue.onIdle();

    expect(socialPoster.posts).toHaveLength(1);
    expect(socialPoster.posts[0].media).toEqual({ buffer: PNG, mimeType: 'image/png', fileName: 'cover.png' });
  });
});

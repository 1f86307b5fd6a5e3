import request from 'supertest';
import sharp from 'sharp';
import app from '../src/app';
import { getRuntime } from '../src/services/runtime';

const photo = () =>
  sharp({ create: { width: 320, height: 240, channels: 3, background: { r: 10, g: 120, b: 200 } } })
    .png()
    .toBuffer();

describe('POST /api/v1/users', () => {
  it('requires an authenticated caller', async () => {
    const res = await request(app).post('/api/v1/users').send({ nickname: 'anon_user' }).expect(401);
    expect(res.body).toEqual({ error: 'unauthorized', message: 'Invalid authentication context' });
  });

  it('creates a user and rejects a second registration', async () => {
    const res = await request(app)
      .post('/api/v1/users')
      .set('x-user-id', 'e2e-create')
      .send({ nickname: 'creator' })
      .expect(201);
    expect(res.body.message).toBe('User created successfully');
    expect(res.body.user).toMatchObject({ identity: 'e2e-create', nickname: 'creator' });

    const again = await request(app)
      .post('/api/v1/users')
      .set('x-user-id', 'e2e-create')
      .send({ nickname: 'creator2' })
      .expect(409);
    expect(again.body).toMatchObject({ error: 'conflict', reason: 'user_exists' });
  });

  it('validates the payload', async () => {
    const res = await request(app).post('/api/v1/users').set('x-user-id', 'e2e-invalid').send({}).expect(400);
    expect(res.body).toMatchObject({ error: 'invalid_input', message: 'Nickname is required' });

    const reserved = await request(app)
      .post('/api/v1/users')
      .set('x-user-id', 'e2e-invalid')
      .send({ nickname: 'admin' })
      .expect(400);
    expect(reserved.body).toMatchObject({ error: 'invalid_input', reason: 'reserved' });
  });
});

describe('GET /api/v1/users/by-nickname/:nickname', () => {
  it('finds users case-insensitively', async () => {
    await request(app).post('/api/v1/users').set('x-user-id', 'e2e-lookup').send({ nickname: 'Finder' }).expect(201);

    const res = await request(app).get('/api/v1/users/by-nickname/FINDER').set('x-user-id', 'someone').expect(200);
    expect(res.body.user).toMatchObject({ identity: 'e2e-lookup', nickname: 'Finder' });
    expect(typeof res.body.retrieved_at).toBe('string');
  });

  it('returns 404 for unknown nicknames', async () => {
    const res = await request(app).get('/api/v1/users/by-nickname/nobody_here').set('x-user-id', 'someone').expect(404);
    expect(res.body.error).toBe('not_found');
  });
});

describe('GET /api/v1/nicknames/:nickname/validate', () => {
  it('reports availability', async () => {
    const res = await request(app).get('/api/v1/nicknames/brand_new/validate').set('x-user-id', 'someone').expect(200);
    expect(res.body).toEqual({ nickname: 'brand_new', valid: true, available: true, requested_by: 'someone' });
  });

  it('reports format problems without failing the request', async () => {
    const res = await request(app).get('/api/v1/nicknames/a__b/validate').set('x-user-id', 'someone').expect(200);
    expect(res.body).toMatchObject({
      valid: false,
      available: false,
      reason: 'invalid_format',
      message: 'Nickname cannot contain consecutive underscores or hyphens',
    });
  });
});

describe('photo endpoints', () => {
  it('uploads a raw image for a new user, refreshes and deletes it', async () => {
    const png = await photo();

    const first = await request(app)
      .post('/api/v1/users/e2e-photo/photo')
      .set('x-user-id', 'e2e-photo')
      .send({ image: `data:image/png;base64,${png.toString('base64')}`, nickname: 'shutterbug' })
      .expect(200);
    expect(first.body.message).toBe('Photo uploaded successfully');
    expect(first.body.created).toBe(true);
    expect(first.body.photo).toMatchObject({ width: 320, height: 240, content_type: 'image/jpeg' });
    expect(first.body.photo_url).toBe(first.body.photo.url);

    const second = await request(app)
      .post('/api/v1/users/e2e-photo/photo')
      .set('x-user-id', 'e2e-photo')
      .set('Content-Type', 'image/png')
      .send(png)
      .expect(200);
    expect(second.body.created).toBe(false);
    expect(second.body.old_assets.deleted).toEqual([first.body.photo.key]);

    const refreshed = await request(app)
      .get('/api/v1/users/e2e-photo/photo/refresh')
      .set('x-user-id', 'e2e-photo')
      .expect(200);
    expect(refreshed.body.user.image_key).toBe(second.body.photo.key);

    const deleted = await request(app).delete('/api/v1/users/e2e-photo/photo').set('x-user-id', 'e2e-photo').expect(200);
    expect(deleted.body.message).toBe('Photos deleted successfully');
    expect(deleted.body.removed_assets).toEqual([second.body.photo.key]);

    const empty = await request(app).delete('/api/v1/users/e2e-photo/photo').set('x-user-id', 'e2e-photo').expect(200);
    expect(empty.body.message).toBe('No photos to delete');
  });

  it('reports stored files it could not list on photo delete', async () => {
    await request(app).post('/api/v1/users').set('x-user-id', 'e2e-listing').send({ nickname: 'lister' }).expect(201);
    const runtime = await getRuntime();
    jest.spyOn(runtime.assets, 'listByPrefix').mockRejectedValueOnce(new Error('SlowDown'));

    const res = await request(app).delete('/api/v1/users/e2e-listing/photo').set('x-user-id', 'e2e-listing').expect(200);
    expect(res.body.message).toBe('Photo removed; some stored files could not be deleted');
    expect(res.body.failed_assets).toEqual([
      { key: 'users/e2e-listing/', code: 'ListFailed', message: 'ServiceError: External call failed: assets.listByPrefix' },
    ]);
  });

  it('rejects uploads without image data', async () => {
    const res = await request(app)
      .post('/api/v1/users/e2e-photo-empty/photo')
      .set('x-user-id', 'e2e-photo-empty')
      .send({ nickname: 'nophoto' })
      .expect(400);
    expect(res.body).toMatchObject({ error: 'invalid_input', message: 'No image data in request body' });
  });

  it('rejects data that is not an image', async () => {
    const res = await request(app)
      .post('/api/v1/users/e2e-photo-bad/photo')
      .set('x-user-id', 'e2e-photo-bad')
      .send({ image: Buffer.from('plain text').toString('base64'), nickname: 'badphoto' })
      .expect(400);
    expect(res.body).toMatchObject({ error: 'invalid_input', reason: 'unsupported_format' });

    await request(app).get('/api/v1/users/by-nickname/badphoto').set('x-user-id', 'someone').expect(404);
  });

  it('forbids uploading for another user', async () => {
    const png = await photo();
    const res = await request(app)
      .post('/api/v1/users/e2e-create/photo')
      .set('x-user-id', 'intruder')
      .set('Content-Type', 'image/png')
      .send(png)
      .expect(403);
    expect(res.body.error).toBe('forbidden');
  });
});

describe('DELETE /api/v1/users/:userId', () => {
  it('requires confirmation', async () => {
    await request(app).post('/api/v1/users').set('x-user-id', 'e2e-delete').send({ nickname: 'leaver' }).expect(201);

    const res = await request(app).delete('/api/v1/users/e2e-delete').set('x-user-id', 'e2e-delete').expect(400);
    expect(res.body).toMatchObject({
      error: 'invalid_input',
      reason: 'confirmation_required',
      usage: 'DELETE /users/{userId}?confirm=true',
    });
  });

  it('deletes the account with the given reason', async () => {
    const res = await request(app)
      .delete('/api/v1/users/e2e-delete')
      .query({ confirm: 'TRUE' })
      .set('x-user-id', 'e2e-delete')
      .send({ reason: 'moving on' })
      .expect(200);
    expect(res.body).toMatchObject({
      message: 'User account deleted successfully',
      deleted_user: { identity: 'e2e-delete', nickname: 'leaver' },
      reason: 'moving on',
      warning: 'This action cannot be undone',
    });

    await request(app).get('/api/v1/users/by-nickname/leaver').set('x-user-id', 'someone').expect(404);
  });
});

describe('misc routes', () => {
  it('GET /api/v1/health reports storage modes', async () => {
    const res = await request(app).get('/api/v1/health').expect(200);
    expect(res.body).toMatchObject({ ok: true, auth_mode: 'header', storage: { users: 'mock', assets: 'mock' } });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(app).get('/api/v1/unknown').expect(404);
    expect(res.body.error).toBe('not_found');
  });
});

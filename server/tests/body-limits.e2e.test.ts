import request from 'supertest';
import app from '../src/app';
import { loadServiceConfig } from '../src/lib/config';
import { ENV } from '../src/lib/env';
import { resetRuntime } from '../src/services/runtime';

async function useMaxImageSize(bytes: number) {
  resetRuntime();
  await loadServiceConfig({
    env: { ...ENV, PARAMETER_STORE_PREFIX: '/user-service/test' },
    fetchParameters: async () => ({ 'max-image-size': String(bytes) }),
  });
}

afterAll(() => {
  resetRuntime();
});

describe('request body limits', () => {
  it('accepts bodies up to a raised max-image-size parameter', async () => {
    await useMaxImageSize(ENV.MAX_IMAGE_SIZE * 2);
    const body = Buffer.alloc(ENV.MAX_IMAGE_SIZE + 1024 * 1024, 1);

    const res = await request(app)
      .post('/api/v1/users/limits-raised/photo')
      .set('x-user-id', 'limits-raised')
      .set('Content-Type', 'image/png')
      .send(body)
      .expect(400);

    expect(res.body).toMatchObject({ error: 'invalid_input', reason: 'unsupported_format' });
  });

  it('rejects bodies over a lowered max-image-size parameter', async () => {
    await useMaxImageSize(1024);

    const res = await request(app)
      .post('/api/v1/users/limits-lowered/photo')
      .set('x-user-id', 'limits-lowered')
      .set('Content-Type', 'image/png')
      .send(Buffer.alloc(4096, 1))
      .expect(413);

    expect(res.body).toMatchObject({ error: 'invalid_input', message: 'Request body too large' });
  });

  it('applies the lowered limit to JSON uploads as well', async () => {
    await useMaxImageSize(1024);
    const image = Buffer.alloc(128 * 1024, 1).toString('base64');

    const res = await request(app)
      .post('/api/v1/users/limits-lowered/photo')
      .set('x-user-id', 'limits-lowered')
      .send({ image })
      .expect(413);

    expect(res.body.message).toBe('Request body too large');
  });
});

import sharp from 'sharp';
import { MemoryAssetRepository } from '../src/repositories/memory-asset.repository';
import { MemoryUserRepository } from '../src/repositories/memory-user.repository';
import { SharpImageNormalizer } from '../src/services/image.service';
import { UserService } from '../src/services/user.service';

function createService(maxImageBytes = 5 * 1024 * 1024) {
  const users = new MemoryUserRepository();
  const assets = new MemoryAssetRepository();
  const service = new UserService({
    users,
    assets,
    images: new SharpImageNormalizer(),
    config: {
      maxImageBytes,
      maxWidth: 1920,
      maxHeight: 1080,
      jpegQuality: 85,
      accessUrlTtlDays: 7,
      nicknameMinLen: 3,
      nicknameMaxLen: 20,
      reservedNicknames: ['admin'],
      externalCallTimeoutMs: 10_000,
    },
  });
  return { users, assets, service };
}

describe('user lifecycle scenarios', () => {
  it('registers john_doe once and keeps the nickname unique', async () => {
    const { service, users } = createService();

    const created = await service.createUser('u1', 'john_doe');
    expect(created.nickname).toBe('john_doe');

    await expect(service.createUser('u1', 'john_doe')).rejects.toMatchObject({
      kind: 'conflict',
      reason: 'user_exists',
      details: { user: created },
    });
    await expect(service.createUser('u2', 'john_doe')).rejects.toMatchObject({
      kind: 'conflict',
      reason: 'nickname_taken',
    });
    expect(await users.get('u1')).toEqual(created);
  });

  it('keeps reporting a missing nickname as not found', async () => {
    const { service } = createService();

    await expect(service.lookupByNickname('ghost_user')).rejects.toMatchObject({ kind: 'not_found' });
    await expect(service.lookupByNickname('ghost_user')).rejects.toMatchObject({ kind: 'not_found' });
  });

  it('shrinks a large camera photo and keeps a single asset', async () => {
    const { service, assets } = createService(64 * 1024 * 1024);
    await service.createUser('u1', 'john_doe');
    const small = await sharp({ create: { width: 100, height: 100, channels: 3, background: '#336699' } })
      .jpeg()
      .toBuffer();
    await service.attachPhoto({ identity: 'u1', image: small });

    const large = await sharp({
      create: { width: 4000, height: 3000, channels: 3, background: '#000000', noise: { type: 'gaussian', mean: 128, sigma: 40 } },
    })
      .jpeg({ quality: 95 })
      .toBuffer();

    const result = await service.attachPhoto({ identity: 'u1', requestingIdentity: 'u1', image: large });

    expect(result.photo.width).toBeLessThanOrEqual(1920);
    expect(result.photo.height).toBeLessThanOrEqual(1080);
    expect(result.photo.reduction_percent).toBeGreaterThan(0);
    expect(result.user.image_url).toBe(result.photo.url);
    expect(await assets.listByPrefix('u1')).toHaveLength(1);
  });

  it('leaves the record and photos alone without confirmation', async () => {
    const { service, assets } = createService();
    await service.createUser('u1', 'john_doe');
    const png = await sharp({ create: { width: 40, height: 40, channels: 3, background: '#ffcc00' } }).png().toBuffer();
    await service.attachPhoto({ identity: 'u1', image: png });

    await expect(service.deleteUser({ identity: 'u1', confirm: false })).rejects.toMatchObject({
      kind: 'invalid_input',
      reason: 'confirmation_required',
    });

    await expect(service.getUser('u1')).resolves.toMatchObject({ nickname: 'john_doe' });
    expect(await assets.listByPrefix('u1')).toHaveLength(1);
  });
});

import { MemoryUserRepository } from '../memory-user.repository';
import { RecordStoreError } from '../user.repository';

describe('MemoryUserRepository', () => {
  let now = new Date('2026-03-01T00:00:00Z');
  const repo = () => new MemoryUserRepository(() => now);

  beforeEach(() => {
    now = new Date('2026-03-01T00:00:00Z');
  });

  it('reports an existing identity before a taken nickname', async () => {
    const users = repo();
    await users.createIfAbsent('user-1', 'alice');
    await users.createIfAbsent('user-2', 'bob');

    await expect(users.createIfAbsent('user-1', 'bob')).rejects.toMatchObject({ code: 'already_exists' });
    await expect(users.createIfAbsent('user-3', 'BOB')).rejects.toMatchObject({ code: 'nickname_taken' });
  });

  it('sets and clears the photo reference', async () => {
    const users = repo();
    await users.createIfAbsent('user-1', 'alice');
    now = new Date('2026-03-01T00:05:00Z');

    const withPhoto = await users.setImageUrl('user-1', { url: 'memory://bucket/key', key: 'users/user-1/key.jpg' });
    expect(withPhoto).toMatchObject({
      image_url: 'memory://bucket/key',
      image_key: 'users/user-1/key.jpg',
      created_at: '2026-03-01T00:00:00.000Z',
      updated_at: '2026-03-01T00:05:00.000Z',
    });

    const cleared = await users.setImageUrl('user-1', null);
    expect(cleared).not.toHaveProperty('image_url');
    expect(cleared).not.toHaveProperty('image_key');
  });

  it('rejects updates and deletes for unknown users', async () => {
    const users = repo();

    await expect(users.setImageUrl('ghost', null)).rejects.toBeInstanceOf(RecordStoreError);
    await expect(users.delete('ghost')).rejects.toMatchObject({ code: 'not_found', identity: 'ghost' });
  });

  it('returns copies that do not alias stored records', async () => {
    const users = repo();
    const created = await users.createIfAbsent('user-1', 'alice');
    created.nickname = 'mallory';

    expect((await users.get('user-1'))?.nickname).toBe('alice');
  });

  it('frees the nickname on delete', async () => {
    const users = repo();
    await users.createIfAbsent('user-1', 'Alice');
    await users.delete('user-1');

    expect(await users.getByNickname('alice')).toBeUndefined();
    await expect(users.createIfAbsent('user-2', 'alice')).resolves.toMatchObject({ identity: 'user-2' });
  });
});

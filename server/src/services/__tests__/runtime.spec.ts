import { getRuntime, getUserService, resetRuntime } from '../runtime';

describe('runtime', () => {
  afterEach(() => {
    resetRuntime();
  });

  it('uses in-memory storage under MOCK=1', async () => {
    const runtime = await getRuntime();

    expect(runtime.modes).toEqual({ users: 'mock', assets: 'mock' });
    expect(runtime.config.reservedNicknames).toContain('admin');
  });

  it('shares one service per container until reset', async () => {
    const first = await getUserService();
    expect(await getUserService()).toBe(first);

    resetRuntime();

    expect(await getUserService()).not.toBe(first);
  });
});

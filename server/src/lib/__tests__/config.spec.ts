import { applyParameters, buildServiceConfig, configFromEnv } from '../config';
import { ENV } from '../env';

describe('service config', () => {
  it('defaults reserved nicknames to the bundled list', () => {
    const config = configFromEnv({ ...ENV, RESERVED_NICKNAMES: [] });
    expect(config.reservedNicknames).toContain('admin');
    expect(config.maxImageBytes).toBe(ENV.MAX_IMAGE_SIZE);
  });

  it('overlays Parameter Store values and ignores non-numeric ones', () => {
    const base = configFromEnv({ ...ENV, MAX_IMAGE_WIDTH: 1920 });
    const next = applyParameters(base, {
      'max-image-size': '1048576',
      'max-width': 'wide',
      'reserved-nicknames': 'root, staff,,',
      'unknown-setting': '5',
    });

    expect(next.maxImageBytes).toBe(1048576);
    expect(next.maxWidth).toBe(1920);
    expect(next.reservedNicknames).toEqual(['root', 'staff']);
    expect(base.reservedNicknames).toContain('admin');
  });

  it('reads parameters under the configured prefix', async () => {
    const fetchParameters = jest.fn(async () => ({ 'access-url-ttl-days': '2', 'nickname-max-length': '12' }));

    const config = await buildServiceConfig({
      env: { ...ENV, PARAMETER_STORE_PREFIX: '/user-service/test' },
      fetchParameters,
    });

    expect(fetchParameters).toHaveBeenCalledWith('/user-service/test');
    expect(config.accessUrlTtlDays).toBe(2);
    expect(config.nicknameMaxLen).toBe(12);
  });

  it('skips Parameter Store when no prefix is set', async () => {
    const fetchParameters = jest.fn(async () => ({ 'max-width': '10' }));

    const config = await buildServiceConfig({ env: { ...ENV, PARAMETER_STORE_PREFIX: '' }, fetchParameters });

    expect(fetchParameters).not.toHaveBeenCalled();
    expect(config.maxWidth).toBe(ENV.MAX_IMAGE_WIDTH);
  });

  it('falls back to environment values when Parameter Store is unreachable', async () => {
    const config = await buildServiceConfig({
      env: { ...ENV, PARAMETER_STORE_PREFIX: '/user-service/test' },
      fetchParameters: async () => {
        throw new Error('AccessDeniedException');
      },
    });

    expect(config.maxImageBytes).toBe(ENV.MAX_IMAGE_SIZE);
  });

  it('rejects a minimum nickname length above the maximum', async () => {
    await expect(
      buildServiceConfig({
        env: { ...ENV, PARAMETER_STORE_PREFIX: '/user-service/test' },
        fetchParameters: async () => ({ 'nickname-min-length': '30' }),
      })
    ).rejects.toThrow('nicknameMinLen must not exceed nicknameMaxLen');
  });
});

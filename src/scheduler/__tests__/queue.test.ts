import { describe, it, expect, afterEach } from 'vitest';
import { appConfig } from '../../config.js';
import { createRedisConnection, parseRedisUrl } from '../queue.js';

describe('parseRedisUrl', () => {
  it('reads host, port and password', () => {
    expect(parseRedisUrl('redis://:test-secret@cache.internal:6380')).toEqual({
      host: 'cache.internal',
      port: 6380,
      password: 'test-secret',
      maxRetriesPerRequest: null,
    });
  });

  it('defaults the port and enables TLS for rediss://', () => {
    expect(parseRedisUrl('rediss://cache.internal')).toEqual({
      host: 'cache.internal',
      port: 6379,
      password: undefined,
      tls: {},
      maxRetriesPerRequest: null,
    });
  });
});

describe('createRedisConnection', () => {
  const original = { ...appConfig.redis };

  afterEach(() => {
    appConfig.redis = { ...original };
  });

  it('prefers REDIS_URL', () => {
    appConfig.redis = { url: 'redis://queue.internal:7000', host: 'ignored', port: 1, password: undefined };

    expect(createRedisConnection()).toMatchObject({ host: 'queue.internal', port: 7000 });
  });

  it('falls back to host and port settings', () => {
    appConfig.redis = { url: undefined, host: 'redis-host', port: 6390, password: 'test-secret' };

    expect(createRedisConnection()).toEqual({
      host: 'redis-host',
      port: 6390,
      password: 'test-secret',
      maxRetriesPerRequest: null,
    });
  });
});

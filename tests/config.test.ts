import { describe, expect, it } from 'vitest';
import { parseEnv } from '../src/config';

describe('parseEnv', () => {
  it('fills in defaults', () => {
    expect(parseEnv({})).toEqual({
      PORT: 4009,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
      UPSTREAM_TIMEOUT_MS: 5000,
    });
  });

  it('coerces numeric variables', () => {
    const env = parseEnv({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      UPSTREAM_BASE_URL: 'http://127.0.0.1:5000',
      UPSTREAM_TIMEOUT_MS: '250',
    });

    expect(env.PORT).toBe(8080);
    expect(env.LOG_LEVEL).toBe('debug');
    expect(env.UPSTREAM_BASE_URL).toBe('http://127.0.0.1:5000');
    expect(env.UPSTREAM_TIMEOUT_MS).toBe(250);
  });

  it('rejects invalid values', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow();
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => parseEnv({ UPSTREAM_BASE_URL: 'not a url' })).toThrow();
  });
});

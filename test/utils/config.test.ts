import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig } from '../../src/utils/config.js';
import { StartupError } from '../../src/utils/errors.js';

const credentials = {
  DB_USER: 'tasks',
  DB_PASSWORD: 'test-secret',
  DB_NAME: 'tasks_test',
};

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.database).toMatchObject({
      host: 'localhost',
      port: 5432,
      pool: { min: 1, max: 10 },
      statementTimeoutMs: 5000,
    });
    expect(config.cors.origins).toEqual(['http://localhost:3000']);
  });

  it('reads database settings from the environment', () => {
    const config = loadConfig({
      ...credentials,
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_POOL_MIN: '2',
      DB_POOL_MAX: '4',
      CORS_ORIGINS: 'https://a.example, https://b.example',
    });

    expect(config.database).toMatchObject({
      host: 'db.internal',
      port: 6543,
      user: 'tasks',
      database: 'tasks_test',
      pool: { min: 2, max: 4 },
    });
    expect(config.cors.origins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('ignores numbers it cannot parse', () => {
    expect(loadConfig({ DB_PORT: 'five' }).database.port).toBe(5432);
  });
});

describe('validateConfig', () => {
  it('names every missing credential', () => {
    expect(() => validateConfig({ DB_USER: 'tasks' }))
      .toThrow('Missing required environment variables: DB_PASSWORD, DB_NAME');
  });

  it('raises a StartupError', () => {
    expect(() => validateConfig({})).toThrow(StartupError);
  });

  it('rejects a pool whose minimum exceeds its maximum', () => {
    expect(() => validateConfig({ ...credentials, DB_POOL_MIN: '5', DB_POOL_MAX: '2' }))
      .toThrow('Invalid pool size: min=5, max=2');
  });

  it('returns the loaded configuration', () => {
    expect(validateConfig(credentials).database.user).toBe('tasks');
  });
});

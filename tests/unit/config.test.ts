import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError, GEMINI_OPENAI_BASE_URL, loadConfig } from '../../src/config/config';

describe('loadConfig', () => {
  it('applies defaults and warns about the ephemeral secret', () => {
    const { config, warnings } = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.nodeEnv).toBe('development');
    expect(config.usersDir).toBe(path.resolve('./users'));
    expect(config.auth).toMatchObject({ jwtAlgorithm: 'HS256', accessTokenExpireMinutes: 30, bcryptRounds: 12 });
    expect(config.auth.jwtSecret).toMatch(/^[0-9a-f]{64}$/);
    expect(config.llm.baseUrl).toBe(GEMINI_OPENAI_BASE_URL);
    expect(config.upload.maxBytes).toBe(20 * 1024 * 1024);
    expect(config.logging.silent).toBe(false);
    expect(warnings).toEqual(['JWT_SECRET not set; using an ephemeral secret for this process']);
  });

  it('reads overrides', () => {
    const { config, warnings } = loadConfig({
      PORT: '9001',
      NODE_ENV: 'test',
      USERS_DIR: '/srv/users',
      JWT_SECRET: 'test-secret-0123456789',
      JWT_ALGORITHM: 'HS512',
      ACCESS_TOKEN_EXPIRE_MINUTES: '5',
      LLM_BASE_URL: 'http://localhost:11434/v1/',
      MAX_UPLOAD_BYTES: '1024',
    });

    expect(warnings).toEqual([]);
    expect(config.port).toBe(9001);
    expect(config.usersDir).toBe(path.resolve('/srv/users'));
    expect(config.auth).toMatchObject({
      jwtSecret: 'test-secret-0123456789',
      jwtAlgorithm: 'HS512',
      accessTokenExpireMinutes: 5,
    });
    expect(config.llm.baseUrl).toBe('http://localhost:11434/v1');
    expect(config.upload.maxBytes).toBe(1024);
    expect(config.logging.silent).toBe(true);
  });

  it('refuses to start in production without a secret', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(
      new ConfigError('JWT_SECRET must be set in production')
    );
  });

  it('reports malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ JWT_ALGORITHM: 'none' })).toThrow(ConfigError);
    expect(() => loadConfig({ JWT_SECRET: 'short' })).toThrow(/JWT_SECRET must be at least 16 characters/);
  });
});

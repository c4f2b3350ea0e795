/**
 * Tests for environment configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getCorsOrigins, getDbPoolConfig, loadConfig, resetConfig } from '../config';
import { parseServeOptions } from '../../commands/serve';

describe('config', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
  });

  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe('0.0.0.0');
    expect(config.REPOS_DIR).toBe('./repos');
    expect(config.GIT_BIN).toBe('git');
  });

  it('should coerce numbers', () => {
    expect(loadConfig({ PORT: '8080', DB_POOL_MAX: '5' })).toMatchObject({ PORT: 8080, DB_POOL_MAX: 5 });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/PORT/);
  });

  it('should require a database in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(/DATABASE_URL is required/);
  });

  it('should split CORS origins', () => {
    loadConfig({ CORS_ORIGINS: 'https://a.example.com, https://b.example.com,' });
    expect(getCorsOrigins()).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  it('should allow local origins in development', () => {
    loadConfig({});
    expect(getCorsOrigins()).toEqual(['http://localhost:5173', 'http://localhost:3000']);
  });

  it('should build the pool configuration', () => {
    loadConfig({ DATABASE_URL: 'postgres://localhost:5432/mergedesk', DB_POOL_MIN: '0' });

    expect(getDbPoolConfig()).toEqual({
      connectionString: 'postgres://localhost:5432/mergedesk',
      max: 20,
      min: 0,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  });
});

describe('parseServeOptions', () => {
  it('should read long and short flags', () => {
    expect(parseServeOptions(['--port', '4000', '-H', '127.0.0.1', '--repos', '/srv/repos'])).toEqual({
      port: '4000',
      host: '127.0.0.1',
      repos: '/srv/repos',
      help: false,
    });
  });

  it('should recognize help', () => {
    expect(parseServeOptions(['-h']).help).toBe(true);
  });

  it('should ignore a flag without a value', () => {
    expect(parseServeOptions(['--port'])).toEqual({ help: false });
  });
});

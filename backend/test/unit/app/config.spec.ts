import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(buildConfig({})).toEqual({
      nodeEnv: 'development',
      port: 5000,
      databaseUrl: 'sqlite::memory:',
      dbResetOnStart: false,
      logLevel: 'info',
      serviceName: 'user-auth-service',
      logRedactFields: ['name', 'email', 'phone', 'ssn', 'password'],
      bcryptCost: 12,
    });
  });

  it('reads explicit values', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_URL: 'postgres://localhost/app',
      DB_RESET_ON_START: 'true',
      LOG_LEVEL: 'debug',
      SERVICE_NAME: 'auth-api',
      BCRYPT_COST: '10',
    });

    expect(config).toMatchObject({
      nodeEnv: 'production',
      port: 8080,
      databaseUrl: 'postgres://localhost/app',
      dbResetOnStart: true,
      logLevel: 'debug',
      serviceName: 'auth-api',
      bcryptCost: 10,
    });
  });

  it('accepts the whole bcrypt cost range', () => {
    expect(buildConfig({ BCRYPT_COST: '4' }).bcryptCost).toBe(4);
    expect(buildConfig({ BCRYPT_COST: '15' }).bcryptCost).toBe(15);
  });

  it('trims the redact field list and drops empty entries', () => {
    expect(buildConfig({ LOG_REDACT_FIELDS: ' ssn, ,token ,' }).logRedactFields).toEqual([
      'ssn',
      'token',
    ]);
  });

  it('rejects invalid values', () => {
    expect(() => buildConfig({ NODE_ENV: 'staging' })).toThrow();
    expect(() => buildConfig({ BCRYPT_COST: '3' })).toThrow();
    expect(() => buildConfig({ BCRYPT_COST: '16' })).toThrow();
    expect(() => buildConfig({ DB_RESET_ON_START: 'yes' })).toThrow();
  });
});

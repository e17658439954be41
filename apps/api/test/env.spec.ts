import { describe, it, expect } from 'vitest';
import { envSchema, toAppConfig } from '../src/core/config/env';

const base = {
  DATABASE_URL: 'postgres://localhost:5432/flyerqr',
  JWT_SECRET: 'x'.repeat(32)
};

describe('envSchema', () => {
  it('applies defaults', () => {
    const env = envSchema.parse(base);

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 4000,
      DATABASE_POOL_MAX: 5,
      PUBLIC_BASE_URL: 'http://localhost:4000'
    });
    expect(env.DATABASE_SSL).toBeUndefined();
  });

  it('parses numbers, booleans and strips the trailing slash', () => {
    const env = envSchema.parse({
      ...base,
      PORT: '8080',
      DATABASE_SSL: 'YES',
      PUBLIC_BASE_URL: 'https://flyers.example.org/'
    });

    expect(env.PORT).toBe(8080);
    expect(env.DATABASE_SSL).toBe(true);
    expect(env.PUBLIC_BASE_URL).toBe('https://flyers.example.org');
  });

  it('reports invalid fields', () => {
    const parsed = envSchema.safeParse({ ...base, JWT_SECRET: 'short', PORT: 'abc' });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const fields = parsed.error.flatten().fieldErrors;
      expect(fields.JWT_SECRET).toEqual(['JWT_SECRET must be at least 32 characters']);
      expect(fields.PORT).toEqual(['PORT must be a positive integer']);
    }
  });

  it('rejects non-http base URLs', () => {
    expect(
      envSchema.safeParse({ ...base, PUBLIC_BASE_URL: 'ftp://flyers.example.org' }).success
    ).toBe(false);
  });

  it('maps to the app config', () => {
    expect(toAppConfig(envSchema.parse({ ...base, NODE_ENV: 'test' }))).toEqual({
      nodeEnv: 'test',
      jwtSecret: 'x'.repeat(32),
      publicBaseUrl: 'http://localhost:4000'
    });
  });
});

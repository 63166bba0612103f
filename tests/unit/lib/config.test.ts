/**
 * Configuration Unit Tests
 */

import { describe, expect, it } from 'vitest';

import {
  getSweepIntervalMs,
  loadConfig,
  MAX_SWEEP_INTERVAL_MINUTES,
} from '@/lib/config.js';

const baseEnv = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_KEY: 'test-service-key',
};

describe('loadConfig', () => {
  it('should apply defaults for optional variables', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_KEY: 'test-service-key',
      UPSTASH_REDIS_URL: undefined,
      UPSTASH_REDIS_TOKEN: undefined,
      RENEW_RATE_LIMIT: 30,
      RENEW_RATE_WINDOW_SECONDS: 60,
      SWEEP_INTERVAL_MINUTES: 60,
      ALLOWED_ORIGINS: ['http://localhost:3000'],
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: '8080',
      RENEW_RATE_LIMIT: '5',
      SWEEP_INTERVAL_MINUTES: '0.5',
    });

    expect(config.PORT).toBe(8080);
    expect(config.RENEW_RATE_LIMIT).toBe(5);
    expect(config.SWEEP_INTERVAL_MINUTES).toBe(0.5);
  });

  it('should treat empty strings as unset', () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: '',
      UPSTASH_REDIS_URL: '',
      UPSTASH_REDIS_TOKEN: '',
    });

    expect(config.PORT).toBe(3000);
    expect(config.UPSTASH_REDIS_URL).toBeUndefined();
    expect(config.UPSTASH_REDIS_TOKEN).toBeUndefined();
  });

  it('should split and trim allowed origins', () => {
    const config = loadConfig({
      ...baseEnv,
      ALLOWED_ORIGINS: 'http://a.test, http://b.test ,',
    });

    expect(config.ALLOWED_ORIGINS).toEqual(['http://a.test', 'http://b.test']);
  });

  it('should list every invalid variable in one error', () => {
    let message = '';
    try {
      loadConfig({ SUPABASE_URL: 'not-a-url', PORT: '-1' });
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }

    expect(message).toMatch(/^Invalid configuration: /);
    expect(message).toContain('SUPABASE_URL: Invalid url');
    expect(message).toContain('SUPABASE_SERVICE_KEY: Required');
    expect(message).toContain('PORT: ');
  });
});

describe('getSweepIntervalMs', () => {
  it('should reject intervals a timer cannot hold', () => {
    expect(() =>
      loadConfig({ ...baseEnv, SWEEP_INTERVAL_MINUTES: '36000' })
    ).toThrow(
      'Invalid configuration: SWEEP_INTERVAL_MINUTES: Number must be less than or equal to 35791'
    );
  });

  it('should accept the largest interval a timer can hold', () => {
    const config = loadConfig({
      ...baseEnv,
      SWEEP_INTERVAL_MINUTES: String(MAX_SWEEP_INTERVAL_MINUTES),
    });

    expect(MAX_SWEEP_INTERVAL_MINUTES).toBe(35791);
    expect(getSweepIntervalMs(config)).toBe(2_147_460_000);
    expect(getSweepIntervalMs(config)).toBeLessThanOrEqual(2_147_483_647);
  });

  it('should convert minutes to milliseconds', () => {
    const config = loadConfig({ ...baseEnv, SWEEP_INTERVAL_MINUTES: '15' });
    expect(getSweepIntervalMs(config)).toBe(900000);
  });

  it('should disable the worker at zero', () => {
    const config = loadConfig({ ...baseEnv, SWEEP_INTERVAL_MINUTES: '0' });
    expect(getSweepIntervalMs(config)).toBeNull();
  });
});

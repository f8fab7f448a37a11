import { join } from 'node:path';
import { describe, test, expect } from 'vitest';
import { buildConfig, validateConfig } from './index.js';

describe('buildConfig', () => {
  test('applies defaults for an empty environment', () => {
    const config = buildConfig({});

    expect(config.region).toBe('us-east-1');
    expect(config.patternsPath.endsWith(join('patterns', 'api-gateway-errors.yaml'))).toBe(true);
    expect(config.defaultWindowMinutes).toBe(15);
    expect(config.queryPollIntervalMs).toBe(1000);
    expect(config.queryBackoffRate).toBe(1.5);
    expect(config.queryMaxWaitMs).toBe(300_000);
    expect(config.runLogDir).toBeUndefined();
  });

  test('prefers AWS_REGION over AWS_DEFAULT_REGION', () => {
    expect(buildConfig({ AWS_REGION: 'eu-west-1', AWS_DEFAULT_REGION: 'us-west-2' }).region).toBe('eu-west-1');
    expect(buildConfig({ AWS_DEFAULT_REGION: 'us-west-2' }).region).toBe('us-west-2');
  });

  test('reads overrides from the environment', () => {
    const config = buildConfig({
      ERROR_PATTERNS_PATH: '/etc/troubleshooter/patterns.yaml',
      DEFAULT_WINDOW_MINUTES: '60',
      QUERY_POLL_INTERVAL_MS: '250',
      QUERY_BACKOFF_RATE: '2',
      QUERY_MAX_WAIT_MS: '10000',
      RUN_LOG_DIR: '/tmp/runs',
    });

    expect(config).toEqual({
      region: 'us-east-1',
      patternsPath: '/etc/troubleshooter/patterns.yaml',
      defaultWindowMinutes: 60,
      queryPollIntervalMs: 250,
      queryBackoffRate: 2,
      queryMaxWaitMs: 10_000,
      runLogDir: '/tmp/runs',
    });
  });
});

describe('validateConfig', () => {
  test('accepts the defaults', () => {
    expect(validateConfig(buildConfig({}))).toEqual([]);
  });

  test('accepts GovCloud regions', () => {
    expect(validateConfig(buildConfig({ AWS_REGION: 'us-gov-west-1' }))).toEqual([]);
  });

  test('reports every invalid setting', () => {
    const errors = validateConfig(buildConfig({
      AWS_REGION: 'moon',
      DEFAULT_WINDOW_MINUTES: 'abc',
      QUERY_MAX_WAIT_MS: '0',
      QUERY_BACKOFF_RATE: '0.5',
    }));

    expect(errors).toEqual([
      'Invalid AWS region: moon',
      'DEFAULT_WINDOW_MINUTES must be a positive number',
      'QUERY_MAX_WAIT_MS must be a positive number',
      'QUERY_BACKOFF_RATE must be a number of at least 1',
    ]);
  });
});

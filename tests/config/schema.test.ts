import { describe, it, expect } from 'vitest';
import { parseConfig, defaultConfig, DEFAULT_HOST_INTERVALS } from '../../src/config/schema.js';
import { ConfigError } from '../../src/config/errors.js';

describe('parseConfig', () => {
  it('should fill every default from an empty object', () => {
    expect(defaultConfig()).toEqual({
      maxLoc: 400,
      maxDirs: 8,
      minDiffs: 2,
      groupRootFiles: false,
      concurrency: 4,
      cache: { enabled: true, dir: '.cache/diffs' },
      rateLimit: {
        enabled: true,
        secondsBetweenRequests: 0,
        hosts: { 'api.github.com': 1.0, 'patch-diff.githubusercontent.com': 1.6 },
        lowQuotaThreshold: 100,
        quotaPauseSeconds: 60,
        refreshQuota: true,
      },
      fetch: {
        timeoutMs: 30000,
        retryAfterDefaultSeconds: 60,
        maxRetryWaitSeconds: 300,
        useApiUrl: true,
      },
      github: {},
    });
  });

  it('should treat undefined and null as empty', () => {
    expect(parseConfig(undefined)).toEqual(defaultConfig());
    expect(parseConfig(null)).toEqual(defaultConfig());
  });

  it('should keep defaults for options a nested object leaves out', () => {
    const config = parseConfig({ maxLoc: 0, cache: { enabled: false } });

    expect(config.maxLoc).toBe(0);
    expect(config.cache).toEqual({ enabled: false, dir: '.cache/diffs' });
  });

  it('should not share the default host table between configs', () => {
    const first = defaultConfig();
    first.rateLimit.hosts['example.com'] = 3;

    expect(defaultConfig().rateLimit.hosts).toEqual(DEFAULT_HOST_INTERVALS);
  });

  it('should reject invalid values with one issue per path', () => {
    try {
      parseConfig({ maxLoc: -1, minDiffs: 0, cache: { dir: '' } });
      expect.unreachable('parseConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(3);
        expect(error.issues[0]).toMatch(/^maxLoc: /);
        expect(error.issues[1]).toMatch(/^minDiffs: /);
        expect(error.issues[2]).toMatch(/^cache\.dir: /);
        expect(error.message.startsWith('Invalid configuration\n  - maxLoc: ')).toBe(true);
      }
    }
  });

  it('should reject non-integer thresholds', () => {
    expect(() => parseConfig({ maxDirs: 2.5 })).toThrow(ConfigError);
  });

  it('should reject unknown options', () => {
    expect(() => parseConfig({ maxLines: 10 })).toThrow(ConfigError);
  });

  it('should report a non-object config at the root', () => {
    try {
      parseConfig('yes');
      expect.unreachable('parseConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues[0]).toMatch(/^\(root\): /);
      }
    }
  });
});

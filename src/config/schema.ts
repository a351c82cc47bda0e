/**
 * Configuration schema
 *
 * Every option has a default, so an empty object parses to a complete
 * configuration.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Minimum seconds between requests for known GitHub hosts */
export const DEFAULT_HOST_INTERVALS: Record<string, number> = {
  'api.github.com': 1.0,
  'patch-diff.githubusercontent.com': 1.6,
};

const cacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    dir: z.string().min(1).default('.cache/diffs'),
  })
  .strict();

const rateLimitSchema = z
  .object({
    enabled: z.boolean().default(true),
    secondsBetweenRequests: z.number().nonnegative().default(0),
    hosts: z.record(z.string(), z.number().nonnegative()).default(() => ({ ...DEFAULT_HOST_INTERVALS })),
    lowQuotaThreshold: z.number().int().nonnegative().default(100),
    quotaPauseSeconds: z.number().nonnegative().default(60),
    refreshQuota: z.boolean().default(true),
  })
  .strict();

const fetchSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(30000),
    retryAfterDefaultSeconds: z.number().nonnegative().default(60),
    maxRetryWaitSeconds: z.number().nonnegative().default(300),
    useApiUrl: z.boolean().default(true),
  })
  .strict();

const githubSchema = z
  .object({
    token: z.string().min(1).optional(),
  })
  .strict();

export const splitConfigSchema = z
  .object({
    maxLoc: z.number().int().nonnegative().default(400),
    maxDirs: z.number().int().min(1).default(8),
    minDiffs: z.number().int().min(1).default(2),
    groupRootFiles: z.boolean().default(false),
    concurrency: z.number().int().min(1).default(4),
    cache: cacheSchema.default({}),
    rateLimit: rateLimitSchema.default({}),
    fetch: fetchSchema.default({}),
    github: githubSchema.default({}),
  })
  .strict();

/** Fully resolved configuration */
export type SplitConfig = z.output<typeof splitConfigSchema>;

/** Configuration as written by a user: every field optional */
export type SplitConfigInput = z.input<typeof splitConfigSchema>;

/**
 * Validate raw configuration and fill in defaults
 *
 * @throws ConfigError listing every invalid option
 */
export function parseConfig(input: unknown): SplitConfig {
  const result = splitConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError('Invalid configuration', issues);
  }
  return result.data;
}

/**
 * Default configuration
 */
export function defaultConfig(): SplitConfig {
  return parseConfig({});
}

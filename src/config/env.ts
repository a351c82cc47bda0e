/**
 * Environment configuration
 *
 * Token priority (highest to lowest):
 * 1. ATOMIZE_GITHUB_TOKEN
 * 2. GITHUB_TOKEN
 * 3. github.token from the config file
 *
 * `.env` files are loaded by the CLI entry point through dotenv before
 * anything here reads process.env.
 */

import type { SplitConfigInput } from './schema.js';

/**
 * GitHub token from the environment, if any
 */
export function getGithubToken(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const token = env.ATOMIZE_GITHUB_TOKEN || env.GITHUB_TOKEN;
  return token ? token.trim() || undefined : undefined;
}

/**
 * Configuration fragments taken from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SplitConfigInput {
  const fragment: SplitConfigInput = {};

  const token = getGithubToken(env);
  if (token) {
    fragment.github = { token };
  }

  const cacheDir = env.ATOMIZE_CACHE_DIR?.trim();
  if (cacheDir) {
    fragment.cache = { dir: cacheDir };
  }

  return fragment;
}

/**
 * Mask a token for display
 */
export function maskToken(token: string): string {
  if (token.length <= 12) {
    return '***';
  }
  return token.slice(0, 4) + '...' + token.slice(-4);
}

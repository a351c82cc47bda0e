/**
 * Configuration Module
 */

export {
  parseConfig,
  defaultConfig,
  splitConfigSchema,
  DEFAULT_HOST_INTERVALS,
  type SplitConfig,
  type SplitConfigInput,
} from './schema.js';

export {
  resolveConfig,
  loadConfigFile,
  camelizeKeys,
  deepMerge,
  CONFIG_FILE_NAMES,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './loader.js';

export { getGithubToken, configFromEnv, maskToken } from './env.js';

export { ConfigError } from './errors.js';

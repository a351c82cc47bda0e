/**
 * Configuration loader
 *
 * Resolution order (later wins):
 * 1. Built-in defaults (schema.ts)
 * 2. Config file: --config path, else the first of CONFIG_FILE_NAMES in cwd
 * 3. Environment (env.ts)
 * 4. Command-line overrides
 *
 * Files are YAML or JSON. Options may sit at the top level or under a
 * `pr_split` key, in camelCase or snake_case.
 */

import { readFile, access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from './errors.js';
import { configFromEnv } from './env.js';
import { parseConfig, type SplitConfig, type SplitConfigInput } from './schema.js';

export const CONFIG_FILE_NAMES = ['atomize.config.yaml', 'atomize.config.yml', 'atomize.config.json'];

/** Section name used when the file holds settings for several tools */
const SECTION_KEY = 'pr_split';

/** Keys whose children are data (host names), not option names */
const VERBATIM_KEYS = new Set(['hosts']);

export interface ResolveConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Directory searched for CONFIG_FILE_NAMES (default: process.cwd()) */
  cwd?: string;
  /** Command-line overrides */
  overrides?: SplitConfigInput;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  config: SplitConfig;
  /** Config file that was applied, if any */
  source?: string;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

/**
 * Rewrite snake_case option names to camelCase, recursively
 */
export function camelizeKeys(value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }
  const result: PlainObject = {};
  for (const [key, child] of Object.entries(value)) {
    const name = toCamelCase(key);
    result[name] = VERBATIM_KEYS.has(name) ? child : camelizeKeys(child);
  }
  return result;
}

/**
 * Merge plain objects recursively; arrays and scalars from `override` replace
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read one config file into raw (unvalidated) options
 *
 * @throws ConfigError when the file is unreadable or not a mapping
 */
export async function loadConfigFile(filePath: string): Promise<PlainObject> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot parse config file ${filePath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }

  const section = parsed[SECTION_KEY];
  const options = isPlainObject(section) ? section : parsed;
  const camelized = camelizeKeys(options);
  return isPlainObject(camelized) ? camelized : {};
}

/**
 * Locate the config file to apply
 */
async function findConfigFile(options: ResolveConfigOptions): Promise<string | undefined> {
  if (options.configPath) {
    const explicit = resolve(options.configPath);
    if (!(await fileExists(explicit))) {
      throw new ConfigError(`Config file not found: ${explicit}`);
    }
    return explicit;
  }

  const cwd = options.cwd ?? process.cwd();
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Resolve the effective configuration
 *
 * @throws ConfigError for missing or malformed files and invalid values
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
  const source = await findConfigFile(options);
  const fromFile = source ? await loadConfigFile(source) : {};

  let raw = deepMerge({}, fromFile);
  raw = deepMerge(raw, { ...configFromEnv(options.env ?? process.env) });
  raw = deepMerge(raw, { ...(options.overrides ?? {}) });

  return { config: parseConfig(raw), source };
}

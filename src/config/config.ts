/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { SearchOverrides, WikiLadderConfig } from './types.js';
import { DEFAULT_CONFIG, PROVIDER_PAGE_CAP } from './defaults.js';
import {
  ConfigError,
  ConfigNotFoundError,
  InvalidSearchConfigError,
  toError,
} from '../shared/errors.js';

const CONFIG_DIR = '.wikiladder';
const CONFIG_FILE = 'config.json';

/**
 * Resolve the .wikiladder directory path from a given working directory.
 */
export function resolveConfigDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

/**
 * Resolve the config.json path.
 */
export function resolveConfigPath(cwd: string): string {
  return path.join(resolveConfigDir(cwd), CONFIG_FILE);
}

/**
 * Resolve the link cache database path.
 */
export function resolveCachePath(cwd: string, config: WikiLadderConfig): string {
  return path.resolve(resolveConfigDir(cwd), config.cache.file);
}

/**
 * Check if a config file exists.
 */
export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults.
 */
export function loadConfig(cwd: string): WikiLadderConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${toError(err).message}`,
      toError(err),
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config at ${configPath} must be a JSON object`);
  }
  return mergeWithDefaults(parsed);
}

/**
 * Load config if present, defaults otherwise.
 */
export function loadConfigOrDefaults(cwd: string): WikiLadderConfig {
  return configExists(cwd) ? loadConfig(cwd) : mergeWithDefaults({});
}

/**
 * Save config to disk.
 */
export function saveConfig(cwd: string, config: WikiLadderConfig): void {
  const dir = resolveConfigDir(cwd);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(
    resolveConfigPath(cwd),
    JSON.stringify(config, null, 2) + '\n',
    'utf-8',
  );
}

/**
 * Apply per-run overrides on top of a loaded config.
 */
export function applyOverrides(
  config: WikiLadderConfig,
  overrides: SearchOverrides,
): WikiLadderConfig {
  return {
    ...config,
    search: {
      query_limit: overrides.queryLimit ?? config.search.query_limit,
      anchor_threshold: overrides.anchorThreshold ?? config.search.anchor_threshold,
      fetch_limit: overrides.fetchLimit ?? config.search.fetch_limit,
      max_expansions:
        overrides.maxExpansions !== undefined
          ? overrides.maxExpansions
          : config.search.max_expansions,
    },
    cache: {
      ...config.cache,
      enabled: overrides.cache ?? config.cache.enabled,
    },
  };
}

export interface SearchLimits {
  queryLimit: number;
  anchorThreshold: number;
  fetchLimit: number;
}

/**
 * Reject limits that are not positive integers, a query limit above what the
 * API serves per page, and an anchor threshold no backlink query could reach.
 */
export function validateSearchLimits(limits: SearchLimits): void {
  const { queryLimit, anchorThreshold, fetchLimit } = limits;

  const checks: Array<[string, number]> = [
    ['queryLimit', queryLimit],
    ['anchorThreshold', anchorThreshold],
    ['fetchLimit', fetchLimit],
  ];
  for (const [name, value] of checks) {
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidSearchConfigError(
        `${name} must be a positive integer (got ${value})`,
      );
    }
  }
  if (queryLimit > PROVIDER_PAGE_CAP) {
    throw new InvalidSearchConfigError(
      `queryLimit must not exceed ${PROVIDER_PAGE_CAP} (got ${queryLimit})`,
    );
  }
  if (queryLimit * PROVIDER_PAGE_CAP < anchorThreshold) {
    throw new InvalidSearchConfigError(
      `anchorThreshold ${anchorThreshold} is unreachable with queryLimit ${queryLimit}`,
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(
  parent: Record<string, unknown>,
  key: string,
): Record<string, unknown> {
  const value = parent[key];
  return isRecord(value) ? value : {};
}

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function logLevel(
  value: unknown,
  fallback: WikiLadderConfig['log']['level'],
): WikiLadderConfig['log']['level'] {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
    ? value
    : fallback;
}

/**
 * Merge a partial config with defaults. Values of the wrong type fall back to
 * the default.
 */
export function mergeWithDefaults(partial: Record<string, unknown>): WikiLadderConfig {
  const wiki = section(partial, 'wiki');
  const search = section(partial, 'search');
  const cache = section(partial, 'cache');
  const log = section(partial, 'log');
  const d = DEFAULT_CONFIG;

  const maxExpansions = search['max_expansions'];

  return {
    wiki: {
      domain: str(wiki['domain'], d.wiki.domain),
      script_path: str(wiki['script_path'], d.wiki.script_path),
      article_path: str(wiki['article_path'], d.wiki.article_path),
      home_title: str(wiki['home_title'], d.wiki.home_title),
      user_agent: str(wiki['user_agent'], d.wiki.user_agent),
      timeout_ms: num(wiki['timeout_ms'], d.wiki.timeout_ms),
      max_retries: num(wiki['max_retries'], d.wiki.max_retries),
      max_lag: num(wiki['max_lag'], d.wiki.max_lag),
    },
    search: {
      query_limit: num(search['query_limit'], d.search.query_limit),
      anchor_threshold: num(search['anchor_threshold'], d.search.anchor_threshold),
      fetch_limit: num(search['fetch_limit'], d.search.fetch_limit),
      max_expansions:
        typeof maxExpansions === 'number' ? maxExpansions : d.search.max_expansions,
    },
    cache: {
      enabled: bool(cache['enabled'], d.cache.enabled),
      file: str(cache['file'], d.cache.file),
    },
    log: {
      level: logLevel(log['level'], d.log.level),
      file: typeof log['file'] === 'string' ? log['file'] : d.log.file,
    },
  };
}

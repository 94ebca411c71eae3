import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import {
  applyOverrides,
  loadConfig,
  loadConfigOrDefaults,
  mergeWithDefaults,
  resolveCachePath,
  resolveConfigPath,
  saveConfig,
  validateSearchLimits,
} from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError, InvalidSearchConfigError } from '../shared/errors.js';

describe('config', () => {
  const dirs: string[] = [];

  function makeTempDir(): string {
    const dir = join(tmpdir(), 'wikiladder-config-' + randomUUID());
    mkdirSync(dir, { recursive: true });
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of dirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    dirs.length = 0;
  });

  describe('loading', () => {
    it('falls back to defaults without a config file', () => {
      expect(loadConfigOrDefaults(makeTempDir())).toEqual(DEFAULT_CONFIG);
    });

    it('round-trips a saved config', () => {
      const cwd = makeTempDir();
      const config = {
        ...DEFAULT_CONFIG,
        wiki: { ...DEFAULT_CONFIG.wiki, domain: 'de.wikipedia.org', home_title: 'Wikipedia:Hauptseite' },
      };

      saveConfig(cwd, config);

      expect(loadConfig(cwd)).toEqual(config);
    });

    it('requires the file for loadConfig', () => {
      expect(() => loadConfig(makeTempDir())).toThrow(ConfigNotFoundError);
    });

    it('wraps malformed JSON in ConfigError', () => {
      const cwd = makeTempDir();
      mkdirSync(join(cwd, '.wikiladder'));
      writeFileSync(resolveConfigPath(cwd), '{ not json');

      expect(() => loadConfig(cwd)).toThrow(ConfigError);
      expect(() => loadConfig(cwd)).toThrow(/Failed to load config/);
    });

    it('rejects a config that is not an object', () => {
      const cwd = makeTempDir();
      mkdirSync(join(cwd, '.wikiladder'));
      writeFileSync(resolveConfigPath(cwd), '[1, 2]');

      expect(() => loadConfig(cwd)).toThrow('must be a JSON object');
    });
  });

  describe('mergeWithDefaults', () => {
    it('keeps valid values and replaces mistyped ones', () => {
      const config = mergeWithDefaults({
        search: { query_limit: '50', fetch_limit: 3, max_expansions: 200 },
        log: { level: 'loud' },
      });

      expect(config.search).toEqual({
        query_limit: 500,
        anchor_threshold: 1000,
        fetch_limit: 3,
        max_expansions: 200,
      });
      expect(config.log.level).toBe('warn');
    });
  });

  describe('applyOverrides', () => {
    it('replaces only the given values', () => {
      const config = applyOverrides(DEFAULT_CONFIG, { queryLimit: 50, cache: false });

      expect(config.search.query_limit).toBe(50);
      expect(config.search.anchor_threshold).toBe(1000);
      expect(config.cache).toEqual({ enabled: false, file: 'links.db' });
    });

    it('lets an override lift the expansion cap', () => {
      const capped = { ...DEFAULT_CONFIG, search: { ...DEFAULT_CONFIG.search, max_expansions: 10 } };

      expect(applyOverrides(capped, { maxExpansions: null }).search.max_expansions).toBeNull();
      expect(applyOverrides(capped, {}).search.max_expansions).toBe(10);
    });
  });

  describe('validateSearchLimits', () => {
    const defaults = { queryLimit: 500, anchorThreshold: 1000, fetchLimit: 2 };

    it('accepts the defaults', () => {
      expect(() => validateSearchLimits(defaults)).not.toThrow();
    });

    it('rejects non-integer and non-positive limits', () => {
      expect(() => validateSearchLimits({ ...defaults, anchorThreshold: 1.5 })).toThrow(
        'anchorThreshold must be a positive integer (got 1.5)',
      );
      expect(() => validateSearchLimits({ ...defaults, fetchLimit: 0 })).toThrow(
        InvalidSearchConfigError,
      );
    });

    it('caps the query limit at one API page', () => {
      expect(() => validateSearchLimits({ ...defaults, queryLimit: 501 })).toThrow(
        'queryLimit must not exceed 500 (got 501)',
      );
    });

    it('requires the anchor threshold to be reachable', () => {
      expect(() =>
        validateSearchLimits({ ...defaults, queryLimit: 2, anchorThreshold: 1000 }),
      ).not.toThrow();
      expect(() =>
        validateSearchLimits({ ...defaults, queryLimit: 2, anchorThreshold: 1001 }),
      ).toThrow('anchorThreshold 1001 is unreachable with queryLimit 2');
    });
  });

  it('resolves the cache file inside .wikiladder', () => {
    const cwd = makeTempDir();
    expect(resolveCachePath(cwd, DEFAULT_CONFIG)).toBe(join(cwd, '.wikiladder', 'links.db'));
  });
});

/**
 * WikiLadderEngine - Core Layer facade
 *
 * Interface Layer (CLI / MCP) accesses all functionality through this facade only.
 * Owns one GraphOracle, so every search on an engine shares one link cache.
 * Each search runs on its own oracle session and reports only its own fetches.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { SearchOverrides, WikiLadderConfig } from '../config/types.js';
import {
  applyOverrides,
  loadConfigOrDefaults,
  resolveCachePath,
  resolveConfigDir,
  validateSearchLimits,
} from '../config/config.js';
import type {
  LinkCacheStats,
  OracleStats,
  PageInspection,
  PathResult,
  SearchStats,
  Title,
} from '../shared/types.js';
import { InvalidInputError, InvalidSearchConfigError } from '../shared/errors.js';
import { normalizeTitle } from '../shared/title.js';
import {
  configureLogger,
  createLogger,
  closeLogger,
  type Logger,
  type LogLevel,
} from '../shared/logger.js';
import type { LinkStore } from '../data/types.js';
import { SqliteLinkStore } from '../data/services/sqlite-link-store.js';
import type { WikiTransport } from './transport/transport.js';
import { MediaWikiClient } from './transport/mediawiki-client.js';
import { extractWikiLinks } from './transport/html-link-extractor.js';
import { GraphOracle } from './graph/graph-oracle.js';
import { Ladder } from './ladder/ladder.js';
import { AnchorSearch } from './search/anchor-search.js';
import { CompletionSearch } from './search/completion-search.js';

export interface WikiLadderEngineDeps {
  config: WikiLadderConfig;
  /** Defaults to a MediaWikiClient for config.wiki */
  transport?: WikiTransport;
  store?: LinkStore | null;
  /** Millisecond clock for elapsed times */
  now?: () => number;
}

export interface CreateEngineOptions {
  overrides?: SearchOverrides;
  /** Takes precedence over config.log.level */
  logLevel?: LogLevel;
  transport?: WikiTransport;
}

const DEFAULT_OUTBOUND_SAMPLE = 50;

type LegOutcome =
  | { complete: true; path: Title[] }
  | { complete: false; partial: Array<Title | null> };

/**
 * Throw InvalidSearchConfigError for limits no search could run with.
 */
export function validateEngineConfig(config: WikiLadderConfig): void {
  const { search } = config;
  validateSearchLimits({
    queryLimit: search.query_limit,
    anchorThreshold: search.anchor_threshold,
    fetchLimit: search.fetch_limit,
  });
  const cap = search.max_expansions;
  if (cap !== null && (!Number.isInteger(cap) || cap < 1)) {
    throw new InvalidSearchConfigError(
      `maxExpansions must be a positive integer (got ${cap})`,
    );
  }
}

export class WikiLadderEngine {
  readonly config: WikiLadderConfig;
  private readonly oracle: GraphOracle;
  private store: LinkStore | null;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(deps: WikiLadderEngineDeps) {
    validateEngineConfig(deps.config);

    const { wiki, search } = deps.config;
    this.config = deps.config;
    this.store = deps.store ?? null;
    this.now = deps.now ?? (() => Date.now());
    this.logger = createLogger('WikiLadderEngine');

    const articlePrefix = `${wiki.article_path.replace(/\/+$/, '')}/`;
    this.oracle = new GraphOracle({
      transport: deps.transport ?? createTransport(deps.config),
      queryLimit: search.query_limit,
      fetchLimit: search.fetch_limit,
      homeTitle: wiki.home_title,
      extractLinks: (html) => extractWikiLinks(html, { articlePath: articlePrefix }),
      store: this.store,
    });
  }

  // --- Path search ---

  async findPath(start: string, end: string): Promise<PathResult> {
    const began = this.now();
    const session = this.oracle.session();

    const outcome = await this.searchLeg(session, normalizeTitle(start), normalizeTitle(end));
    return this.toResult(outcome, session, began);
  }

  /**
   * Path through every title in order. Legs are joined on their shared node;
   * the first leg without a path ends the chain.
   */
  async findChainedPath(titles: readonly string[]): Promise<PathResult> {
    if (titles.length < 2) {
      throw new InvalidInputError(
        `A chained path needs at least two titles (got ${titles.length})`,
      );
    }
    const began = this.now();
    const session = this.oracle.session();

    const [first, ...rest] = titles.map((t) => normalizeTitle(t));
    let current = first ?? '';
    let path: Title[] = [current];

    for (const next of rest) {
      const leg = await this.searchLeg(session, current, next);
      if (!leg.complete) {
        return this.toResult(
          { complete: false, partial: [...path, ...leg.partial.slice(1)] },
          session,
          began,
        );
      }
      path = [...path, ...leg.path.slice(1)];
      current = next;
    }

    return this.toResult({ complete: true, path }, session, began);
  }

  // --- Diagnostics ---

  async inspectPage(
    title: string,
    outboundLimit: number = DEFAULT_OUTBOUND_SAMPLE,
  ): Promise<PageInspection> {
    const normalized = normalizeTitle(title);

    const degree = await this.oracle.degree(normalized);
    const popularity = await this.oracle.popularity(normalized);
    const redirects = [...(await this.oracle.redirectsTo(normalized))].sort();
    const outbound = [...(await this.oracle.outboundNeighbors(normalized))]
      .filter((t) => t !== normalized)
      .sort()
      .slice(0, outboundLimit);

    return { title: normalized, degree, popularity, redirects, outbound, outboundLimit };
  }

  stats(): OracleStats {
    return this.oracle.stats();
  }

  // --- Persistent cache ---

  get cacheEnabled(): boolean {
    return this.store !== null;
  }

  cacheStats(): LinkCacheStats | null {
    return this.store?.stats() ?? null;
  }

  clearCache(): void {
    if (!this.store) return;
    this.store.clear();
    this.logger.info('Link cache cleared');
  }

  async close(): Promise<void> {
    if (this.store) {
      this.store.close();
      this.store = null;
    }
    closeLogger();
  }

  // --- Internal helpers ---

  private async searchLeg(session: GraphOracle, from: Title, to: Title): Promise<LegOutcome> {
    if (session.sameNode(from, to)) {
      return { complete: true, path: [from] };
    }

    const { search } = this.config;
    const anchorSearch = new AnchorSearch(session, {
      anchorThreshold: search.anchor_threshold,
      maxExpansions: search.max_expansions,
    });
    const completionSearch = new CompletionSearch(session, {
      maxExpansions: search.max_expansions,
    });

    this.logger.debug(`Searching "${from}" -> "${to}"`);
    const ladder = await Ladder.create(session, from, to);
    const anchored = await anchorSearch.run(ladder);
    const result = await completionSearch.run(anchored);

    const sequence = result.toSequence();
    if (result.isComplete()) {
      return { complete: true, path: sequence.filter((t): t is Title => t !== null) };
    }
    return { complete: false, partial: sequence };
  }

  private toResult(outcome: LegOutcome, session: GraphOracle, began: number): PathResult {
    const stats: SearchStats = { ...session.stats(), elapsedMs: this.now() - began };
    if (outcome.complete) {
      return { status: 'found', path: outcome.path, stats };
    }
    return {
      status: 'not_found',
      reason: session.isNetworkDown() ? 'network_unavailable' : 'exhausted',
      partial: outcome.partial,
      stats,
    };
  }
}

function createTransport(config: WikiLadderConfig): WikiTransport {
  const { wiki } = config;
  return new MediaWikiClient({
    domain: wiki.domain,
    scriptPath: wiki.script_path,
    articlePath: wiki.article_path,
    userAgent: wiki.user_agent,
    timeoutMs: wiki.timeout_ms,
    maxRetries: wiki.max_retries,
    maxLag: wiki.max_lag,
  });
}

/**
 * Build an engine for `cwd`: config from .wikiladder/config.json (defaults
 * when absent) plus overrides, logger configured, link cache opened when
 * enabled.
 */
export async function createWikiLadderEngine(
  cwd: string,
  options: CreateEngineOptions = {},
): Promise<WikiLadderEngine> {
  const config = applyOverrides(loadConfigOrDefaults(cwd), options.overrides ?? {});

  configureLogger({
    level: options.logLevel ?? config.log.level,
    file: config.log.file ? path.resolve(resolveConfigDir(cwd), config.log.file) : null,
  });

  // before the cache file is created
  validateEngineConfig(config);

  let store: LinkStore | null = null;
  if (config.cache.enabled) {
    const dbPath = resolveCachePath(cwd, config);
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    store = SqliteLinkStore.open(dbPath);
  }

  return new WikiLadderEngine({ config, transport: options.transport, store });
}

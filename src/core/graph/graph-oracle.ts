/**
 * GraphOracle - memoized, budget-bounded view of the remote link graph
 *
 * Neighbor sets are fetched at most once per title for the lifetime of the
 * oracle. In-flight fetches are shared, so concurrent callers asking for the
 * same title wait on the same promise. Fetch failures never escape: they are
 * logged and answered with an empty set (kept in memory, never persisted).
 *
 * Lookup order: memory → LinkStore (when injected) → transport.
 *
 * `session()` returns a view over the same caches with counters of its own,
 * so concurrent searches can each report what they fetched.
 */

import { createLogger, type Logger } from '../../shared/logger.js';
import { TransportError, toError } from '../../shared/errors.js';
import { sameTitle } from '../../shared/title.js';
import type { OracleStats, Title } from '../../shared/types.js';
import type { LinkStore } from '../../data/types.js';
import type { RungLinker } from '../ladder/ladder.js';
import type { LinkExtractor, WikiTransport } from '../transport/transport.js';
import { extractWikiLinks } from '../transport/html-link-extractor.js';

export interface GraphOracleOptions {
  transport: WikiTransport;
  /** Results requested per backlink page (1..500) */
  queryLimit: number;
  /** Backlink pages fetched per inboundNeighbors call */
  fetchLimit: number;
  /** Removed from every outbound set */
  homeTitle?: Title;
  extractLinks?: LinkExtractor;
  store?: LinkStore | null;
  logger?: Logger;
}

type SetKind = 'outbound' | 'inbound' | 'redirects';

const EMPTY: ReadonlySet<Title> = new Set<Title>();

/** State every session of one oracle shares */
interface SharedState {
  resolved: Record<SetKind, Map<Title, ReadonlySet<Title>>>;
  inflight: Record<SetKind, Map<Title, Promise<ReadonlySet<Title>>>>;
  /** redirect title → target title */
  aliases: Map<Title, Title>;
}

function createSharedState(): SharedState {
  return {
    resolved: { outbound: new Map(), inbound: new Map(), redirects: new Map() },
    inflight: { outbound: new Map(), inbound: new Map(), redirects: new Map() },
    aliases: new Map(),
  };
}

export class GraphOracle implements RungLinker<Title> {
  private readonly transport: WikiTransport;
  private readonly extractLinks: LinkExtractor;
  private readonly store: LinkStore | null;
  private readonly logger: Logger;

  readonly queryLimit: number;
  readonly fetchLimit: number;
  readonly homeTitle: Title;
  private readonly options: GraphOracleOptions;

  private shared: SharedState = createSharedState();
  /** Receives every count this session makes */
  private parent: GraphOracle | null = null;

  private readonly counters: OracleStats = {
    fetches: 0,
    failedFetches: 0,
    cacheHits: 0,
    storeHits: 0,
  };

  constructor(options: GraphOracleOptions) {
    this.options = options;
    this.transport = options.transport;
    this.queryLimit = options.queryLimit;
    this.fetchLimit = options.fetchLimit;
    this.homeTitle = options.homeTitle ?? 'Main Page';
    this.extractLinks = options.extractLinks ?? ((html) => extractWikiLinks(html));
    this.store = options.store ?? null;
    this.logger = options.logger ?? createLogger('GraphOracle');
  }

  // --- Neighbor sets ---

  /**
   * Titles linked from `title`'s page, `title` itself included and the home
   * page excluded. A redirect answers with its target's set.
   */
  async outboundNeighbors(title: Title): Promise<ReadonlySet<Title>> {
    const target = this.shared.aliases.get(title);
    if (target !== undefined && target !== title) {
      return this.outboundNeighbors(target);
    }
    return this.memo('outbound', title, () => this.loadOutbound(title));
  }

  /**
   * Titles linking to `title` (up to fetchLimit pages of queryLimit results)
   * plus every redirect to it.
   */
  async inboundNeighbors(title: Title): Promise<ReadonlySet<Title>> {
    return this.memo('inbound', title, () => this.loadInbound(title));
  }

  /** Redirect pages pointing at `title`; each becomes an alias of it. */
  async redirectsTo(title: Title): Promise<ReadonlySet<Title>> {
    return this.memo('redirects', title, () => this.loadRedirects(title));
  }

  // --- Derived queries ---

  /**
   * Whether `source` links to `dest`. Cached backlinks of `dest` are checked
   * before the outbound set of `source` is fetched.
   */
  async hasLinkTo(source: Title, dest: Title): Promise<boolean> {
    if (this.shared.resolved.inbound.get(dest)?.has(source)) {
      return true;
    }
    const cached = this.shared.resolved.outbound.get(this.shared.aliases.get(source) ?? source);
    if (cached) {
      return cached.has(dest);
    }
    return (await this.outboundNeighbors(source)).has(dest);
  }

  /** Outbound link count, self excluded. */
  async degree(title: Title): Promise<number> {
    const links = await this.outboundNeighbors(title);
    return links.has(title) ? links.size - 1 : links.size;
  }

  /** Known inbound link count; a lower bound once pagination is cut off. */
  async popularity(title: Title): Promise<number> {
    return (await this.inboundNeighbors(title)).size;
  }

  async linksInCommon(a: Title, b: Title): Promise<number> {
    const aLinks = await this.outboundNeighbors(a);
    const bLinks = await this.outboundNeighbors(b);
    const [small, large] = aLinks.size <= bLinks.size ? [aLinks, bLinks] : [bLinks, aLinks];

    let shared = 0;
    for (const t of small) {
      if (large.has(t)) shared++;
    }
    return shared;
  }

  sameNode(a: Title, b: Title): boolean {
    return sameTitle(a, b);
  }

  stats(): OracleStats {
    return { ...this.counters };
  }

  /**
   * A view sharing this oracle's caches and in-flight fetches whose counters
   * start at zero. Its counts also add to this oracle's totals.
   */
  session(): GraphOracle {
    const view = new GraphOracle(this.options);
    view.shared = this.shared;
    view.parent = this;
    return view;
  }

  /** true once fetches were issued and every one of them failed */
  isNetworkDown(): boolean {
    return this.counters.fetches > 0 && this.counters.failedFetches === this.counters.fetches;
  }

  // --- private ---

  private memo(
    kind: SetKind,
    key: Title,
    load: () => Promise<ReadonlySet<Title>>,
  ): Promise<ReadonlySet<Title>> {
    const done = this.shared.resolved[kind].get(key);
    if (done) {
      this.count('cacheHits');
      return Promise.resolve(done);
    }
    const pending = this.shared.inflight[kind].get(key);
    if (pending) {
      this.count('cacheHits');
      return pending;
    }

    const promise = (async () => {
      try {
        const links = await load();
        this.shared.resolved[kind].set(key, links);
        return links;
      } finally {
        this.shared.inflight[kind].delete(key);
      }
    })();
    this.shared.inflight[kind].set(key, promise);
    return promise;
  }

  private async loadOutbound(title: Title): Promise<ReadonlySet<Title>> {
    const stored = this.store?.getOutbound(title) ?? null;
    if (stored) {
      this.storeHit();
      return stored;
    }

    let html: string;
    try {
      html = await this.fetch(() => this.transport.fetchRenderedPage(title));
    } catch (err) {
      this.logFailure(`outbound links of "${title}"`, err);
      return EMPTY;
    }

    const links = this.extractLinks(html);
    links.add(title);
    links.delete(this.homeTitle);
    this.store?.putOutbound(title, links);
    return links;
  }

  private async loadInbound(title: Title): Promise<ReadonlySet<Title>> {
    const budget = { queryLimit: this.queryLimit, fetchLimit: this.fetchLimit };
    const stored = this.store?.getInbound(title, budget) ?? null;
    const inbound = new Set<Title>(stored ?? []);

    if (stored) {
      this.storeHit();
    } else {
      const { complete, failed } = await this.fetchInboundPages(title, inbound);
      // the store keeps backlinks only; redirects have their own entry
      if (!failed) {
        this.store?.putInbound(title, inbound, { ...budget, complete });
      }
    }

    for (const redirect of await this.redirectsTo(title)) {
      inbound.add(redirect);
    }
    return inbound;
  }

  /** Pages through backlinks into `into`; never more than fetchLimit requests. */
  private async fetchInboundPages(
    title: Title,
    into: Set<Title>,
  ): Promise<{ complete: boolean; failed: boolean }> {
    let cursor: string | null = null;

    for (let page = 0; page < this.fetchLimit; page++) {
      try {
        const result = await this.fetch(() =>
          this.transport.fetchInboundPage(title, cursor, this.queryLimit),
        );
        for (const t of result.titles) {
          into.add(t);
        }
        cursor = result.nextCursor;
      } catch (err) {
        this.logFailure(`inbound links of "${title}" (page ${page + 1})`, err);
        return { complete: false, failed: true };
      }
      if (cursor === null) {
        return { complete: true, failed: false };
      }
    }

    this.logger.debug(
      `Backlinks of "${title}" cut off at ${into.size} after ${this.fetchLimit} page(s)`,
    );
    return { complete: false, failed: false };
  }

  private async loadRedirects(title: Title): Promise<ReadonlySet<Title>> {
    let redirects = this.store?.getRedirects(title) ?? null;
    if (redirects) {
      this.storeHit();
    } else {
      try {
        redirects = await this.fetch(() => this.transport.fetchRedirectsTo(title));
      } catch (err) {
        this.logFailure(`redirects to "${title}"`, err);
        return EMPTY;
      }
      this.store?.putRedirects(title, redirects);
    }

    for (const r of redirects) {
      if (r !== title) {
        this.shared.aliases.set(r, title);
      }
    }
    return redirects;
  }

  private async fetch<T>(request: () => Promise<T>): Promise<T> {
    this.count('fetches');
    try {
      return await request();
    } catch (err) {
      this.count('failedFetches');
      throw err;
    }
  }

  private storeHit(): void {
    this.count('cacheHits');
    this.count('storeHits');
  }

  private count(counter: keyof OracleStats): void {
    this.counters[counter]++;
    this.parent?.count(counter);
  }

  private logFailure(what: string, err: unknown): void {
    const error = toError(err);
    if (error instanceof TransportError) {
      this.logger.warn(`Failed to fetch ${what}: ${error.message}`);
    } else {
      this.logger.warn(`Failed to fetch ${what}`, error);
    }
  }
}

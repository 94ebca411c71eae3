/**
 * wikiladder public API
 */

export { WikiLadderEngine, createWikiLadderEngine, validateEngineConfig } from './core/engine.js';
export type { WikiLadderEngineDeps, CreateEngineOptions } from './core/engine.js';

export { GraphOracle } from './core/graph/graph-oracle.js';
export type { GraphOracleOptions } from './core/graph/graph-oracle.js';
export { Ladder, MAX_PROXIMITY } from './core/ladder/ladder.js';
export type { RungLinker, RungResult, RungRejection } from './core/ladder/ladder.js';
export { AnchorSearch, isYearInPlace } from './core/search/anchor-search.js';
export type { AnchorSearchOptions } from './core/search/anchor-search.js';
export { CompletionSearch } from './core/search/completion-search.js';
export type { CompletionSearchOptions } from './core/search/completion-search.js';
export { PriorityQueue } from './core/search/priority-queue.js';
export type { Comparator } from './core/search/priority-queue.js';

export { MediaWikiClient } from './core/transport/mediawiki-client.js';
export type { MediaWikiClientOptions, FetchLike } from './core/transport/mediawiki-client.js';
export { extractWikiLinks, rehypeWikiLinks } from './core/transport/html-link-extractor.js';
export type { WikiTransport, InboundPage, LinkExtractor } from './core/transport/transport.js';

export { SqliteLinkStore } from './data/services/sqlite-link-store.js';
export type { LinkStore, InboundBudget, InboundMeta } from './data/types.js';

export type { WikiLadderConfig, SearchOverrides } from './config/types.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

export { encodeTitle, decodeTitle, normalizeTitle } from './shared/title.js';
export * from './shared/errors.js';
export type * from './shared/types.js';

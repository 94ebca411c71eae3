import type { WikiLadderConfig } from './types.js';

/** Most titles the MediaWiki API returns in one list page. */
export const PROVIDER_PAGE_CAP = 500;

export const DEFAULT_CONFIG: WikiLadderConfig = {
  wiki: {
    domain: 'en.wikipedia.org',
    script_path: '/w',
    article_path: '/wiki',
    home_title: 'Main Page',
    user_agent: 'wikiladder/0.1 (link path finder; Node.js)',
    timeout_ms: 30_000,
    max_retries: 2,
    max_lag: 5,
  },
  search: {
    query_limit: 500,
    anchor_threshold: 1000,
    fetch_limit: 2,
    max_expansions: null,
  },
  cache: {
    enabled: true,
    file: 'links.db',
  },
  log: {
    level: 'warn',
    file: null,
  },
};

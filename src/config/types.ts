/**
 * wikiladder configuration types
 */

export interface WikiLadderConfig {
  /** MediaWiki site to race on */
  wiki: {
    domain: string;
    script_path: string;
    article_path: string;
    /** Page every article links to; never treated as a neighbor */
    home_title: string;
    user_agent: string;
    timeout_ms: number;
    max_retries: number;
    /** Seconds of replication lag tolerated before the API asks us to wait */
    max_lag: number;
  };

  /** Search budget */
  search: {
    /** Titles requested per backlink page (1-500) */
    query_limit: number;
    /** Minimum backlink count for a page to serve as an anchor */
    anchor_threshold: number;
    /** Backlink pages fetched per title */
    fetch_limit: number;
    /** Ladders popped per search phase; null = unbounded */
    max_expansions: number | null;
  };

  /** Persistent link cache */
  cache: {
    enabled: boolean;
    /** Relative to the .wikiladder directory */
    file: string;
  };

  log: {
    level: 'debug' | 'info' | 'warn' | 'error';
    file: string | null;
  };
}

/** Options a caller may override for one run (CLI flags, MCP tool input). */
export interface SearchOverrides {
  queryLimit?: number;
  anchorThreshold?: number;
  fetchLimit?: number;
  maxExpansions?: number | null;
  cache?: boolean;
}

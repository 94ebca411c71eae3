/**
 * wikiladder shared types
 * Used by the core, the CLI and the MCP layer.
 */

/** A normalized page title (see normalizeTitle). */
export type Title = string;

// --- Oracle ---

export interface OracleStats {
  /** Network requests issued (rendered pages, backlink pages, redirect queries) */
  fetches: number;
  /** Requests that failed after retries */
  failedFetches: number;
  /** Lookups answered from memory or the persistent store */
  cacheHits: number;
  /** Lookups answered from the persistent store only */
  storeHits: number;
}

// --- Path search ---

export type NotFoundReason = 'exhausted' | 'network_unavailable';

export interface SearchStats extends OracleStats {
  elapsedMs: number;
}

export interface PathFound {
  status: 'found';
  path: Title[];
  stats: SearchStats;
}

export interface PathNotFound {
  status: 'not_found';
  reason: NotFoundReason;
  /** Best partial ladder; `null` marks the unclosed gap */
  partial: Array<Title | null>;
  stats: SearchStats;
}

export type PathResult = PathFound | PathNotFound;

// --- Inspection ---

export interface PageInspection {
  title: Title;
  degree: number;
  popularity: number;
  redirects: Title[];
  outbound: Title[];
  /** outbound list was cut to this many entries */
  outboundLimit: number;
}

// --- Cache ---

export interface LinkCacheStats {
  outboundPages: number;
  inboundPages: number;
  redirectPages: number;
  links: number;
}

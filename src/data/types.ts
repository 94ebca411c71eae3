/**
 * Data Layer 内部型定義
 * SQLite テーブルとの直接的なマッピング型
 */

import type { LinkCacheStats, Title } from '../shared/types.js';

/** ISO 8601形式の日時文字列 */
export type ISODateString = string;

/** キャッシュするリンク集合の種別（DDL CHECK制約に対応） */
export type LinkKind = 'outbound' | 'inbound' | 'redirects';

// --- Cached page ---

export interface CachedPageRow {
  title: Title;
  kind: LinkKind;
  /** inbound のみ: 取得時の1ページあたり件数。それ以外・移行前の行は NULL */
  query_limit: number | null;
  /** inbound のみ: 取得時のページ取得上限。それ以外は NULL */
  fetch_limit: number | null;
  /** 0 = continuation が残ったまま打ち切り */
  complete: 0 | 1;
  link_count: number;
  fetched_at: ISODateString;
}

export interface CachedPageInsert {
  queryLimit: number | null;
  fetchLimit: number | null;
  complete: boolean;
}

// --- Link store ---

/** 被リンク一覧の取得予算: 最大 queryLimit × fetchLimit 件 */
export interface InboundBudget {
  queryLimit: number;
  fetchLimit: number;
}

export interface InboundMeta extends InboundBudget {
  /** API が continuation を返さなかった */
  complete: boolean;
}

/**
 * GraphOracle の永続二次キャッシュ。
 * ミス時は null を返す（空集合はヒット扱い）。
 */
export interface LinkStore {
  getOutbound(title: Title): Set<Title> | null;
  putOutbound(title: Title, links: Iterable<Title>): void;
  /** `budget` より小さい予算で打ち切られたエントリはミス扱い */
  getInbound(title: Title, budget: InboundBudget): Set<Title> | null;
  putInbound(title: Title, links: Iterable<Title>, meta: InboundMeta): void;
  getRedirects(title: Title): Set<Title> | null;
  putRedirects(title: Title, redirects: Iterable<Title>): void;
  stats(): LinkCacheStats;
  clear(): void;
  close(): void;
}

// --- Migration ---

export interface Migration {
  version: number;
  description: string;
  up: (db: import('better-sqlite3').Database) => void;
}

import type Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';
import type { LinkCacheStats, Title } from '../../shared/types.js';
import type { CachedPageInsert, CachedPageRow, LinkKind } from '../types.js';

export interface LinkCacheRepository {
  findPage(title: Title, kind: LinkKind): CachedPageRow | undefined;
  /** 格納順（= 取得順）で返す */
  findLinks(title: Title, kind: LinkKind): Title[];
  /** (title, kind) のリンク集合と取得記録を置き換える */
  replace(
    title: Title,
    kind: LinkKind,
    links: Iterable<Title>,
    meta: CachedPageInsert,
  ): void;
  count(): LinkCacheStats;
  clear(): void;
}

const LINK_KINDS: readonly LinkKind[] = ['outbound', 'inbound', 'redirects'];

/** 種別ごとのテーブルとキー列 */
const LINK_TABLES: Record<LinkKind, { table: string; key: string; value: string }> = {
  outbound: { table: 'outbound_links', key: 'source', value: 'target' },
  inbound: { table: 'inbound_links', key: 'target', value: 'source' },
  redirects: { table: 'redirects', key: 'target', value: 'redirect' },
};

interface KindStatements {
  select: Statement;
  remove: Statement;
  insert: Statement;
}

/**
 * プリペアドステートメントは生成時に種別ごとにまとめてコンパイルする。
 */
export function createLinkCacheRepository(db: Database.Database): LinkCacheRepository {
  const perKind = new Map<LinkKind, KindStatements>();
  for (const kind of LINK_KINDS) {
    const { table, key, value } = LINK_TABLES[kind];
    perKind.set(kind, {
      select: db.prepare(`SELECT ${value} AS title FROM ${table} WHERE ${key} = ? ORDER BY rowid`),
      remove: db.prepare(`DELETE FROM ${table} WHERE ${key} = ?`),
      insert: db.prepare(`INSERT OR IGNORE INTO ${table} (${key}, ${value}) VALUES (?, ?)`),
    });
  }

  const selectPage = db.prepare(
    'SELECT * FROM cached_pages WHERE title = ? AND kind = ?',
  );
  const upsertPage = db.prepare(
    `INSERT INTO cached_pages
       (title, kind, query_limit, fetch_limit, complete, link_count, fetched_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(title, kind) DO UPDATE SET
       query_limit = excluded.query_limit,
       fetch_limit = excluded.fetch_limit,
       complete = excluded.complete,
       link_count = excluded.link_count,
       fetched_at = excluded.fetched_at`,
  );
  const countPages = db.prepare(
    'SELECT kind, COUNT(*) AS cnt FROM cached_pages GROUP BY kind',
  );
  const countLinks = db.prepare(
    `SELECT
       (SELECT COUNT(*) FROM outbound_links) +
       (SELECT COUNT(*) FROM inbound_links) +
       (SELECT COUNT(*) FROM redirects) AS cnt`,
  );

  function statementsFor(kind: LinkKind): KindStatements {
    const stmts = perKind.get(kind);
    if (!stmts) {
      throw new Error(`Unknown link kind: ${kind}`);
    }
    return stmts;
  }

  const replaceTx = db.transaction(
    (title: Title, kind: LinkKind, links: Title[], meta: CachedPageInsert) => {
      const stmts = statementsFor(kind);
      stmts.remove.run(title);
      let inserted = 0;
      for (const link of links) {
        inserted += stmts.insert.run(title, link).changes;
      }
      upsertPage.run(
        title,
        kind,
        meta.queryLimit,
        meta.fetchLimit,
        meta.complete ? 1 : 0,
        inserted,
        new Date().toISOString(),
      );
    },
  );

  return {
    findPage(title: Title, kind: LinkKind): CachedPageRow | undefined {
      return selectPage.get(title, kind) as CachedPageRow | undefined;
    },

    findLinks(title: Title, kind: LinkKind): Title[] {
      const rows = statementsFor(kind).select.all(title) as Array<{ title: Title }>;
      return rows.map((r) => r.title);
    },

    replace(
      title: Title,
      kind: LinkKind,
      links: Iterable<Title>,
      meta: CachedPageInsert,
    ): void {
      replaceTx(title, kind, [...links], meta);
    },

    count(): LinkCacheStats {
      const rows = countPages.all() as Array<{ kind: LinkKind; cnt: number }>;
      const pages = new Map(rows.map((r) => [r.kind, r.cnt]));
      const links = (countLinks.get() as { cnt: number }).cnt;

      return {
        outboundPages: pages.get('outbound') ?? 0,
        inboundPages: pages.get('inbound') ?? 0,
        redirectPages: pages.get('redirects') ?? 0,
        links,
      };
    },

    clear(): void {
      db.exec(`
        DELETE FROM outbound_links;
        DELETE FROM inbound_links;
        DELETE FROM redirects;
        DELETE FROM cached_pages;
      `);
    },
  };
}

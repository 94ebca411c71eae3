import type { Migration } from '../types.js';

const INITIAL_SCHEMA_SQL = `
-- schema_version
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER PRIMARY KEY,
    applied_at  TEXT    NOT NULL,
    description TEXT
);

-- cached_pages: (title, kind) ごとの取得記録
CREATE TABLE IF NOT EXISTS cached_pages (
    title       TEXT    NOT NULL,
    kind        TEXT    NOT NULL
                        CHECK(kind IN ('outbound','inbound','redirects')),
    fetch_limit INTEGER,
    complete    INTEGER NOT NULL DEFAULT 1
                        CHECK(complete IN (0, 1)),
    link_count  INTEGER NOT NULL DEFAULT 0,
    fetched_at  TEXT    NOT NULL,
    PRIMARY KEY (title, kind)
);

CREATE INDEX IF NOT EXISTS idx_cached_pages_kind ON cached_pages(kind);

-- outbound_links: source のページ本文にある target へのリンク
CREATE TABLE IF NOT EXISTS outbound_links (
    source  TEXT    NOT NULL,
    target  TEXT    NOT NULL,
    PRIMARY KEY (source, target)
);

-- inbound_links: target にリンクしている source（リダイレクトを除く）
CREATE TABLE IF NOT EXISTS inbound_links (
    target  TEXT    NOT NULL,
    source  TEXT    NOT NULL,
    PRIMARY KEY (target, source)
);

-- redirects: target へのリダイレクトページ
CREATE TABLE IF NOT EXISTS redirects (
    target      TEXT    NOT NULL,
    redirect    TEXT    NOT NULL,
    PRIMARY KEY (target, redirect)
);

CREATE INDEX IF NOT EXISTS idx_redirects_redirect ON redirects(redirect);
`;

export const migration001: Migration = {
  version: 1,
  description: 'リンクキャッシュ初期スキーマ作成',
  up: (db) => {
    db.exec(INITIAL_SCHEMA_SQL);
  },
};

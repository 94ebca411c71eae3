import type { Migration } from '../types.js';

/**
 * 被リンク一覧の取得予算は queryLimit × fetchLimit で決まるため、
 * 1ページあたりの件数も記録する。既存行は NULL（打ち切り済みならミス扱い）。
 */
export const migration002: Migration = {
  version: 2,
  description: 'cached_pages に query_limit 列を追加',
  up: (db) => {
    db.exec('ALTER TABLE cached_pages ADD COLUMN query_limit INTEGER');
  },
};

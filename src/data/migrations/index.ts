import type Database from 'better-sqlite3';
import type { Migration } from '../types.js';
import { MigrationError, toError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { migration001 } from './001-initial-schema.js';
import { migration002 } from './002-inbound-query-limit.js';

const logger = createLogger('Migrations');

const migrations: readonly Migration[] = [migration001, migration002];

/**
 * マイグレーション管理
 * 未適用のマイグレーションを1件ずつトランザクション内で適用し、
 * 同じトランザクションで schema_version に記録する
 */
export function runMigrations(db: Database.Database): number {
  const from = getSchemaVersion(db);
  const pending = migrations.filter((m) => m.version > from);

  for (const migration of pending) {
    try {
      db.transaction(() => {
        migration.up(db);
        db.prepare(
          'INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
        ).run(migration.version, new Date().toISOString(), migration.description);
      })();
    } catch (err) {
      throw new MigrationError(migration.version, toError(err));
    }
    logger.debug(`Applied migration ${migration.version}: ${migration.description}`);
  }

  return getSchemaVersion(db);
}

/** schema_version が無ければ 0 */
export function getSchemaVersion(db: Database.Database): number {
  const tableExists = db
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get() as { name: string } | undefined;

  if (!tableExists) {
    return 0;
  }

  const row = db
    .prepare('SELECT MAX(version) AS max_version FROM schema_version')
    .get() as { max_version: number | null } | undefined;

  return row?.max_version ?? 0;
}

export { migrations };

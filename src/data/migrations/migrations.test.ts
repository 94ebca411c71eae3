import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations, getSchemaVersion, migrations } from './index.js';
import { migration001 } from './001-initial-schema.js';

describe('Migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('should create all tables on fresh database', () => {
    runMigrations(db);

    const tables = db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual([
      'cached_pages',
      'inbound_links',
      'outbound_links',
      'redirects',
      'schema_version',
    ]);
  });

  it('should set schema_version to the latest migration', () => {
    runMigrations(db);

    const row = db
      .prepare('SELECT MAX(version) AS v FROM schema_version')
      .get() as { v: number };
    expect(row.v).toBe(migrations.length);
  });

  it('should be idempotent (running twice is safe)', () => {
    runMigrations(db);
    runMigrations(db);

    const row = db
      .prepare('SELECT COUNT(*) AS cnt FROM schema_version')
      .get() as { cnt: number };
    expect(row.cnt).toBe(migrations.length);
  });

  it('should report version 0 before and the applied version after', () => {
    expect(getSchemaVersion(db)).toBe(0);
    expect(runMigrations(db)).toBe(2);
    expect(getSchemaVersion(db)).toBe(2);
  });

  it('should add query_limit to a version 1 database and keep its rows', () => {
    migration001.up(db);
    db.prepare(
      "INSERT INTO schema_version (version, applied_at, description) VALUES (1, '2024-01-01', 'v1')",
    ).run();
    db.prepare(
      "INSERT INTO cached_pages (title, kind, fetch_limit, complete, fetched_at) VALUES ('T', 'inbound', 2, 0, '2024-01-01')",
    ).run();

    expect(runMigrations(db)).toBe(2);

    const row = db
      .prepare('SELECT query_limit, fetch_limit FROM cached_pages WHERE title = ?')
      .get('T') as { query_limit: number | null; fetch_limit: number };
    expect(row).toEqual({ query_limit: null, fetch_limit: 2 });
  });

  it('should record the migration description', () => {
    runMigrations(db);

    const row = db
      .prepare('SELECT description FROM schema_version WHERE version = 1')
      .get() as { description: string };
    expect(row.description).toBe(migrations[0]?.description);
  });

  it('should create the redirect lookup index', () => {
    runMigrations(db);

    const indexes = db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type='index' AND tbl_name='redirects'",
      )
      .all() as Array<{ name: string }>;

    expect(indexes.map((i) => i.name)).toContain('idx_redirects_redirect');
  });

  it('should reject an unknown link kind', () => {
    runMigrations(db);

    expect(() =>
      db
        .prepare(
          "INSERT INTO cached_pages (title, kind, fetched_at) VALUES ('A', 'sideways', '2024-01-01')",
        )
        .run(),
    ).toThrow();
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, rmSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { DatabaseManager } from './database-manager.js';
import { DatabaseError } from '../shared/errors.js';

function makeTempDir(): string {
  const dir = join(tmpdir(), 'wikiladder-test-' + randomUUID());
  mkdirSync(dir, { recursive: true });
  return dir;
}

describe('DatabaseManager', () => {
  const dirs: string[] = [];

  function createManager(): { manager: DatabaseManager; dbPath: string } {
    const dir = makeTempDir();
    dirs.push(dir);
    const dbPath = join(dir, 'links.db');
    return { manager: new DatabaseManager({ dbPath }), dbPath };
  }

  afterEach(() => {
    for (const dir of dirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    dirs.length = 0;
  });

  it('should initialize and create the database file', () => {
    const { manager, dbPath } = createManager();
    manager.initialize();

    expect(existsSync(dbPath)).toBe(true);
    expect(manager.path).toBe(dbPath);

    manager.close();
  });

  it('should throw if getDb is called before initialize', () => {
    const { manager } = createManager();
    expect(() => manager.getDb()).toThrow(DatabaseError);
  });

  it('should run migrations automatically', () => {
    const { manager } = createManager();
    manager.initialize();

    const version = manager
      .getDb()
      .prepare('SELECT MAX(version) AS v FROM schema_version')
      .get() as { v: number };
    expect(version.v).toBe(2);

    manager.close();
  });

  it('should enable WAL mode', () => {
    const { manager } = createManager();
    manager.initialize();

    const result = manager.getDb().pragma('journal_mode') as Array<{
      journal_mode: string;
    }>;
    expect(result[0]?.journal_mode).toBe('wal');

    manager.close();
  });

  it('should wrap open failures in DatabaseError', () => {
    const dir = makeTempDir();
    dirs.push(dir);
    const manager = new DatabaseManager({ dbPath: join(dir, 'missing', 'links.db') });

    expect(() => manager.initialize()).toThrow(DatabaseError);
  });

  it('should persist link cache entries across reopen', () => {
    const { manager, dbPath } = createManager();
    manager.initialize();
    manager.linkCache.replace('Alpha', 'outbound', ['Alpha', 'Beta'], {
      queryLimit: null,
      fetchLimit: null,
      complete: true,
    });
    manager.close();

    const reopened = new DatabaseManager({ dbPath });
    reopened.initialize();
    expect(reopened.linkCache.findLinks('Alpha', 'outbound')).toEqual(['Alpha', 'Beta']);
    reopened.close();
  });

  it('should close cleanly and tolerate a second close', () => {
    const { manager } = createManager();
    manager.initialize();
    manager.close();

    expect(() => manager.getDb()).toThrow(DatabaseError);
    manager.close();
  });
});

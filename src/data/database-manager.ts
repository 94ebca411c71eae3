import Database from 'better-sqlite3';
import { DatabaseError, toError } from '../shared/errors.js';
import { runMigrations } from './migrations/index.js';
import {
  createLinkCacheRepository,
  type LinkCacheRepository,
} from './repositories/link-cache-repository.js';

export interface DatabaseManagerOptions {
  dbPath: string;
  readonly?: boolean;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly readonlyMode: boolean;

  // Repositories (lazy-initialized)
  private _linkCacheRepo: LinkCacheRepository | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = options.dbPath;
    this.readonlyMode = options.readonly ?? false;
  }

  /**
   * DB接続を開き、PRAGMA設定とマイグレーションを行う
   */
  initialize(): void {
    try {
      this.db = new Database(this.dbPath, {
        readonly: this.readonlyMode,
      });

      // PRAGMA設定
      if (!this.readonlyMode) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('cache_size = -16000');
      this.db.pragma('temp_store = MEMORY');
      this.db.pragma('wal_autocheckpoint = 1000');

      // マイグレーション実行
      if (!this.readonlyMode) {
        runMigrations(this.db);
      }
    } catch (err) {
      this.db?.close();
      this.db = null;
      throw new DatabaseError(
        `Failed to initialize database at ${this.dbPath}`,
        toError(err),
      );
    }
  }

  get path(): string {
    return this.dbPath;
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  // --- Repository accessors ---

  get linkCache(): LinkCacheRepository {
    if (!this._linkCacheRepo) {
      this._linkCacheRepo = createLinkCacheRepository(this.getDb());
    }
    return this._linkCacheRepo;
  }

  /**
   * 安全なシャットダウン（WALチェックポイント + DB close）
   */
  close(): void {
    if (!this.db) return;

    try {
      this._linkCacheRepo = null;

      // WALチェックポイント
      if (!this.readonlyMode) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      }

      this.db.close();
      this.db = null;
    } catch (err) {
      throw new DatabaseError('Failed to close database', toError(err));
    }
  }
}

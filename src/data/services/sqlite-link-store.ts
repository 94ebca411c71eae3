import { DatabaseManager } from '../database-manager.js';
import type { CachedPageRow, InboundBudget, InboundMeta, LinkStore } from '../types.js';
import type { LinkCacheStats, Title } from '../../shared/types.js';

/**
 * better-sqlite3 による LinkStore 実装。
 * outbound / redirects は取得済みなら常にヒット。inbound は打ち切り済みの
 * エントリを、より大きい取得予算（queryLimit × fetchLimit）での問い合わせに
 * 対してはミスとして扱う。
 */
export class SqliteLinkStore implements LinkStore {
  private constructor(private readonly manager: DatabaseManager) {}

  /** ファイル（または ':memory:'）を開いてマイグレーションを済ませる */
  static open(dbPath: string): SqliteLinkStore {
    const manager = new DatabaseManager({ dbPath });
    manager.initialize();
    return new SqliteLinkStore(manager);
  }

  get path(): string {
    return this.manager.path;
  }

  getOutbound(title: Title): Set<Title> | null {
    const repo = this.manager.linkCache;
    if (!repo.findPage(title, 'outbound')) return null;
    return new Set(repo.findLinks(title, 'outbound'));
  }

  putOutbound(title: Title, links: Iterable<Title>): void {
    this.manager.linkCache.replace(title, 'outbound', links, {
      queryLimit: null,
      fetchLimit: null,
      complete: true,
    });
  }

  getInbound(title: Title, budget: InboundBudget): Set<Title> | null {
    const repo = this.manager.linkCache;
    const page = repo.findPage(title, 'inbound');
    if (!page) return null;
    if (page.complete === 0 && storedCapacity(page) < budget.queryLimit * budget.fetchLimit) {
      return null;
    }
    return new Set(repo.findLinks(title, 'inbound'));
  }

  putInbound(title: Title, links: Iterable<Title>, meta: InboundMeta): void {
    this.manager.linkCache.replace(title, 'inbound', links, {
      queryLimit: meta.queryLimit,
      fetchLimit: meta.fetchLimit,
      complete: meta.complete,
    });
  }

  getRedirects(title: Title): Set<Title> | null {
    const repo = this.manager.linkCache;
    if (!repo.findPage(title, 'redirects')) return null;
    return new Set(repo.findLinks(title, 'redirects'));
  }

  putRedirects(title: Title, redirects: Iterable<Title>): void {
    this.manager.linkCache.replace(title, 'redirects', redirects, {
      queryLimit: null,
      fetchLimit: null,
      complete: true,
    });
  }

  stats(): LinkCacheStats {
    return this.manager.linkCache.count();
  }

  clear(): void {
    this.manager.linkCache.clear();
  }

  close(): void {
    this.manager.close();
  }
}

/** 打ち切られた一覧が取得しえた最大件数。query_limit の無い旧行は 0 */
function storedCapacity(page: CachedPageRow): number {
  return (page.query_limit ?? 0) * (page.fetch_limit ?? 0);
}

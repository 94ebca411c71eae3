/**
 * テスト用ヘルパー: メモリ上のリンクグラフを WikiTransport として提供する
 */

import { TransportError } from '../../shared/errors.js';
import { encodeTitle } from '../../shared/title.js';
import type { Title } from '../../shared/types.js';
import type { InboundPage, WikiTransport } from './transport.js';

export interface FakeGraph {
  /** Outbound links per page */
  links: Record<Title, Title[]>;
  /** Backlinks per page; derived from `links` for pages not listed here */
  backlinks?: Record<Title, Title[]>;
  /** Redirect pages per target */
  redirects?: Record<Title, Title[]>;
  /** Every request about these titles fails */
  failing?: Title[];
}

export type FakeOp = 'page' | 'inbound' | 'redirects';

export interface FakeCall {
  op: FakeOp;
  title: Title;
}

export class FakeWikiTransport implements WikiTransport {
  readonly calls: FakeCall[] = [];
  private readonly derivedBacklinks = new Map<Title, Title[]>();
  private readonly failing: Set<Title>;

  constructor(private readonly graph: FakeGraph) {
    for (const [source, targets] of Object.entries(graph.links)) {
      for (const target of targets) {
        if (target === source) continue;
        const list = this.derivedBacklinks.get(target) ?? [];
        list.push(source);
        this.derivedBacklinks.set(target, list);
      }
    }
    this.failing = new Set(graph.failing ?? []);
  }

  count(op?: FakeOp): number {
    return op ? this.calls.filter((c) => c.op === op).length : this.calls.length;
  }

  titles(op: FakeOp): Title[] {
    return this.calls.filter((c) => c.op === op).map((c) => c.title);
  }

  async fetchRenderedPage(title: Title): Promise<string> {
    this.record('page', title);
    const anchors = (this.graph.links[title] ?? [])
      .map((t) => `<a href="/wiki/${encodeTitle(t)}">link</a>`)
      .join('\n');
    return `<html><body><div id="content">${anchors}</div></body></html>`;
  }

  async fetchInboundPage(
    title: Title,
    cursor: string | null,
    limit: number,
  ): Promise<InboundPage> {
    this.record('inbound', title);
    const all = this.graph.backlinks?.[title] ?? this.derivedBacklinks.get(title) ?? [];
    const offset = cursor === null ? 0 : Number(cursor);
    const end = offset + limit;
    return {
      titles: all.slice(offset, end),
      nextCursor: end < all.length ? String(end) : null,
    };
  }

  async fetchRedirectsTo(title: Title): Promise<Set<Title>> {
    this.record('redirects', title);
    return new Set(this.graph.redirects?.[title] ?? []);
  }

  private record(op: FakeOp, title: Title): void {
    this.calls.push({ op, title });
    if (this.failing.has(title)) {
      throw new TransportError(`HTTP 503 for ${title}`, 503);
    }
  }
}

/** `count` filler titles, e.g. fillers('D', 3) → ['D fan 1', 'D fan 2', 'D fan 3'] */
export function fillers(prefix: string, count: number): Title[] {
  return Array.from({ length: count }, (_, i) => `${prefix} fan ${i + 1}`);
}

/**
 * Transport abstraction over the remote link graph
 *
 * The oracle only talks to this interface. The MediaWiki client implements
 * it for real sites; tests implement it over an in-memory graph.
 */

import type { Title } from '../../shared/types.js';

export interface InboundPage {
  titles: Title[];
  /** Continuation token for the next page; null when the listing is done */
  nextCursor: string | null;
}

export interface WikiTransport {
  /** Rendered HTML of an article */
  fetchRenderedPage(title: Title): Promise<string>;

  /** One page of titles linking to `title`, redirects excluded */
  fetchInboundPage(
    title: Title,
    cursor: string | null,
    limit: number,
  ): Promise<InboundPage>;

  /** Titles of redirect pages that point at `title` */
  fetchRedirectsTo(title: Title): Promise<Set<Title>>;
}

/**
 * Pulls the outbound article links out of rendered HTML. Swappable so tests
 * can feed adjacency lists instead of markup.
 */
export type LinkExtractor = (html: string) => Set<Title>;

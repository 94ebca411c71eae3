/**
 * Article link extraction rehype plugin
 *
 * Walks the hast tree of a rendered article and collects every
 * `<a href="/wiki/Target">` that points at the main (article) namespace.
 * Namespaced targets (`File:`, `Category:`, `Special:` ...) carry a colon and
 * are skipped, as are links with a query string.
 */

import { unified, type Plugin } from 'unified';
import rehypeParse from 'rehype-parse';
import type { Element, Root } from 'hast';
import { visit } from 'unist-util-visit';
import { VFile } from 'vfile';
import { tryNormalizeTitle } from '../../shared/title.js';
import type { Title } from '../../shared/types.js';

declare module 'vfile' {
  interface DataMap {
    wikiLinks: Set<Title>;
  }
}

export interface WikiLinkOptions {
  /** URL path prefix of articles, trailing slash included (default "/wiki/") */
  articlePath?: string;
}

/**
 * rehype plugin: collects article links into `file.data.wikiLinks`.
 */
export const rehypeWikiLinks: Plugin<[WikiLinkOptions?], Root> = function (
  options,
) {
  const prefix = options?.articlePath ?? '/wiki/';

  return (tree: Root, file) => {
    const links = new Set<Title>();

    visit(tree, 'element', (node: Element) => {
      if (node.tagName !== 'a') return;

      const href = node.properties['href'];
      if (typeof href !== 'string' || !href.startsWith(prefix)) return;

      const [target = ''] = href.slice(prefix.length).split('#');
      if (target.length === 0 || target.includes(':') || target.includes('?')) {
        return;
      }

      const title = tryNormalizeTitle(target);
      if (title !== null) {
        links.add(title);
      }
    });

    file.data.wikiLinks = links;
  };
};

/**
 * Parse rendered HTML and return the set of normalized article titles it
 * links to.
 */
export function extractWikiLinks(
  html: string,
  options?: WikiLinkOptions,
): Set<Title> {
  const processor = unified().use(rehypeParse).use(rehypeWikiLinks, options);
  const tree = processor.parse(html);
  const file = new VFile(html);
  processor.runSync(tree, file);
  return file.data.wikiLinks ?? new Set<Title>();
}

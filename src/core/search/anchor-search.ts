/**
 * AnchorSearch - pull the destination end of a ladder onto a popular page
 *
 * A forward search from the start has little chance of stumbling onto an
 * obscure destination, so the upper side is first grown backward through
 * backlinks until its frontier has at least `anchorThreshold` known
 * backlinks (or the ladder completes).
 *
 * Best-first: the candidate whose upper frontier is most popular is expanded
 * next. Popularity is looked up once, when a candidate is queued.
 */

import type { GraphOracle } from '../graph/graph-oracle.js';
import type { Ladder } from '../ladder/ladder.js';
import { LadderError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import type { Title } from '../../shared/types.js';
import { PriorityQueue, type Comparator } from './priority-queue.js';

/** "1809 in Denmark"-style pages; only their siblings link to them. */
const YEAR_IN_PLACE = /^[0-9]+ in .*/;

export function isYearInPlace(title: Title): boolean {
  return YEAR_IN_PLACE.test(title);
}

export interface AnchorSearchOptions {
  anchorThreshold: number;
  /** Backlinks the search never steps onto (default: isYearInPlace) */
  isNoise?: (title: Title) => boolean;
  /** Stop after this many expansions; null for no cap */
  maxExpansions?: number | null;
  logger?: Logger;
}

export interface AnchorCandidate {
  ladder: Ladder<Title>;
  popularity: number;
}

export const byPopularityDesc: Comparator<AnchorCandidate> = (a, b) =>
  b.popularity - a.popularity;

export class AnchorSearch {
  private readonly anchorThreshold: number;
  private readonly isNoise: (title: Title) => boolean;
  private readonly maxExpansions: number | null;
  private readonly logger: Logger;

  constructor(
    private readonly oracle: GraphOracle,
    options: AnchorSearchOptions,
  ) {
    this.anchorThreshold = options.anchorThreshold;
    this.isNoise = options.isNoise ?? isYearInPlace;
    this.maxExpansions = options.maxExpansions ?? null;
    this.logger = options.logger ?? createLogger('AnchorSearch');
  }

  async isAnchored(ladder: Ladder<Title>): Promise<boolean> {
    if (ladder.isComplete()) return true;
    return (await this.oracle.popularity(ladder.upperFrontier())) >= this.anchorThreshold;
  }

  /**
   * Returns an anchored ladder derived from `ladder`, or `ladder` itself when
   * it is already anchored or no anchor is reachable.
   */
  async run(ladder: Ladder<Title>): Promise<Ladder<Title>> {
    if (await this.isAnchored(ladder)) {
      return ladder;
    }

    const queue = new PriorityQueue(byPopularityDesc);
    queue.push({
      ladder,
      popularity: await this.oracle.popularity(ladder.upperFrontier()),
    });
    const visited = new Set<Title>([ladder.upperFrontier()]);
    let expansions = 0;

    while (!queue.isEmpty()) {
      if (this.maxExpansions !== null && expansions >= this.maxExpansions) {
        this.logger.debug(`Anchor search stopped after ${expansions} expansions`);
        break;
      }
      const best = queue.pop();
      if (!best) break;
      expansions++;
      this.logger.debug(`best anchor: ${best.ladder.toString()} (${best.popularity})`);

      const upper = best.ladder.upperFrontier();
      for (const rung of await this.oracle.inboundNeighbors(upper)) {
        if (visited.has(rung) || this.isNoise(rung)) continue;
        visited.add(rung);

        const result = await best.ladder.addUpperRung(rung);
        if (result.status === 'noop') continue;
        if (result.status === 'rejected') {
          throw new LadderError(
            `Cannot hang "${rung}" under ${best.ladder.toString()}: ${result.reason}`,
          );
        }

        const derived = result.ladder;
        const popularity = await this.oracle.popularity(rung);
        if (derived.isComplete() || popularity >= this.anchorThreshold) {
          this.logger.debug(`anchored: ${derived.toString()} (${popularity})`);
          return derived;
        }
        queue.push({ ladder: derived, popularity });
      }
    }

    this.logger.debug(`No anchor found for "${ladder.end}"`);
    return ladder;
  }
}

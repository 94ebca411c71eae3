/**
 * CompletionSearch - grow the lower side of an anchored ladder until it
 * reaches the upper frontier
 *
 * Best-first over ladders ordered by proximity (shared outbound links between
 * the two frontiers), shorter ladders first on ties. The backlinks of the
 * upper frontier ("net") are fetched once up front: any new lower rung that
 * links to a page in the net closes the ladder with one more hop.
 */

import type { GraphOracle } from '../graph/graph-oracle.js';
import type { Ladder, RungResult } from '../ladder/ladder.js';
import { LadderError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import type { Title } from '../../shared/types.js';
import { PriorityQueue, type Comparator } from './priority-queue.js';

export interface CompletionSearchOptions {
  /** Stop after this many expansions; null for no cap */
  maxExpansions?: number | null;
  logger?: Logger;
}

export const byProximity: Comparator<Ladder<Title>> = (a, b) => {
  if (a.proximity !== b.proximity) {
    return a.proximity > b.proximity ? -1 : 1;
  }
  return a.height() - b.height();
};

export class CompletionSearch {
  private readonly maxExpansions: number | null;
  private readonly logger: Logger;

  constructor(
    private readonly oracle: GraphOracle,
    options: CompletionSearchOptions = {},
  ) {
    this.maxExpansions = options.maxExpansions ?? null;
    this.logger = options.logger ?? createLogger('CompletionSearch');
  }

  /**
   * Returns a complete ladder, or the best incomplete one seen when the
   * search runs dry (`ladder` itself if nothing beat it).
   */
  async run(ladder: Ladder<Title>): Promise<Ladder<Title>> {
    if (ladder.isComplete()) {
      return ladder;
    }

    const net = await this.oracle.inboundNeighbors(ladder.upperFrontier());
    const queue = new PriorityQueue(byProximity);
    queue.push(ladder);
    const visited = new Set<Title>([ladder.lowerFrontier()]);
    let best = ladder;
    let expansions = 0;

    while (!queue.isEmpty()) {
      if (this.maxExpansions !== null && expansions >= this.maxExpansions) {
        this.logger.debug(`Completion search stopped after ${expansions} expansions`);
        break;
      }
      const current = queue.pop();
      if (!current) break;
      expansions++;
      this.logger.debug(`best so far: ${current.toString()}`);

      for (const neighbor of await this.oracle.outboundNeighbors(current.lowerFrontier())) {
        if (visited.has(neighbor)) continue;

        const derived = applied(await current.addLowerRung(neighbor), neighbor, current);
        if (derived.isComplete()) {
          return derived;
        }

        for (const t of net) {
          if (await this.oracle.hasLinkTo(neighbor, t)) {
            return applied(await derived.addLowerRung(t), t, derived);
          }
        }

        queue.push(derived);
        visited.add(neighbor);
        if (byProximity(derived, best) < 0) {
          best = derived;
        }
      }
    }

    return best;
  }
}

/** Rungs proposed here always come from a known link; anything else is a bug. */
function applied(
  result: RungResult<Title>,
  rung: Title,
  onto: Ladder<Title>,
): Ladder<Title> {
  if (result.status === 'rejected') {
    throw new LadderError(
      `Cannot add "${rung}" above ${onto.toString()}: ${result.reason}`,
    );
  }
  return result.ladder;
}

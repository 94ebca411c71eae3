/**
 * Ladder - a path built from both ends at once
 *
 * The lower side grows forward from the start rung, the upper side grows
 * backward from the end rung. The ladder is complete once the start and end
 * are the same node or the lower frontier links straight to the upper
 * frontier. Ladders are immutable: appending yields a new Ladder.
 *
 * Every adjacent pair on either side is linked in the direction of travel,
 * because an append is only applied after the linker confirms the edge.
 */

/** Supplies link evidence between rungs (GraphOracle for titles). */
export interface RungLinker<R> {
  hasLinkTo(source: R, dest: R): Promise<boolean>;
  sameNode(a: R, b: R): boolean;
  linksInCommon(a: R, b: R): Promise<number>;
}

export type RungRejection = 'no_link' | 'complete';

export type RungResult<R> =
  | { status: 'applied'; ladder: Ladder<R> }
  | { status: 'noop'; ladder: Ladder<R> }
  | { status: 'rejected'; reason: RungRejection };

/** Proximity of a complete ladder. */
export const MAX_PROXIMITY = Number.MAX_SAFE_INTEGER;

const GAP = ', ... , ';

export class Ladder<R> {
  private constructor(
    private readonly linker: RungLinker<R>,
    readonly start: R,
    readonly end: R,
    private readonly lowerRungs: readonly R[],
    private readonly upperRungs: readonly R[],
    private readonly lowerTip: R,
    private readonly upperTip: R,
    private readonly complete: boolean,
    /** Links shared by the two frontiers; MAX_PROXIMITY once complete. */
    readonly proximity: number,
  ) {}

  static async create<R>(linker: RungLinker<R>, start: R, end: R): Promise<Ladder<R>> {
    return Ladder.build(linker, start, end, [start], [end], start, end);
  }

  private static async build<R>(
    linker: RungLinker<R>,
    start: R,
    end: R,
    lower: readonly R[],
    upper: readonly R[],
    lowerTip: R,
    upperTip: R,
  ): Promise<Ladder<R>> {
    const complete =
      linker.sameNode(start, end) || (await linker.hasLinkTo(lowerTip, upperTip));
    const proximity = complete
      ? MAX_PROXIMITY
      : await linker.linksInCommon(lowerTip, upperTip);

    return new Ladder(linker, start, end, lower, upper, lowerTip, upperTip, complete, proximity);
  }

  lowerFrontier(): R {
    return this.lowerTip;
  }

  upperFrontier(): R {
    return this.upperTip;
  }

  isComplete(): boolean {
    return this.complete;
  }

  /** Rungs excluding the fixed start and end. */
  height(): number {
    return this.lowerRungs.length + this.upperRungs.length - 2;
  }

  /** Append `rung` after the lower frontier. */
  async addLowerRung(rung: R): Promise<RungResult<R>> {
    if (rung === this.lowerTip) {
      return { status: 'noop', ladder: this };
    }
    if (this.complete) {
      return { status: 'rejected', reason: 'complete' };
    }
    if (!(await this.linker.hasLinkTo(this.lowerTip, rung))) {
      return { status: 'rejected', reason: 'no_link' };
    }

    const ladder = await Ladder.build(
      this.linker,
      this.start,
      this.end,
      [...this.lowerRungs, rung],
      this.upperRungs,
      rung,
      this.upperTip,
    );
    return { status: 'applied', ladder };
  }

  /** Append `rung` below the upper frontier; `rung` must link to it. */
  async addUpperRung(rung: R): Promise<RungResult<R>> {
    if (rung === this.upperTip) {
      return { status: 'noop', ladder: this };
    }
    if (this.complete) {
      return { status: 'rejected', reason: 'complete' };
    }
    if (!(await this.linker.hasLinkTo(rung, this.upperTip))) {
      return { status: 'rejected', reason: 'no_link' };
    }

    const ladder = await Ladder.build(
      this.linker,
      this.start,
      this.end,
      this.lowerRungs,
      [...this.upperRungs, rung],
      this.lowerTip,
      rung,
    );
    return { status: 'applied', ladder };
  }

  /**
   * Start-to-end rung sequence. An incomplete ladder has `null` at the gap;
   * frontiers that are the same node are emitted once.
   */
  toSequence(): Array<R | null> {
    const upper = [...this.upperRungs].reverse();
    if (!this.complete) {
      return [...this.lowerRungs, null, ...upper];
    }
    if (this.linker.sameNode(this.lowerTip, this.upperTip)) {
      return [...this.lowerRungs, ...upper.slice(1)];
    }
    return [...this.lowerRungs, ...upper];
  }

  toString(): string {
    if (this.complete) {
      return `[${this.toSequence().map(String).join(', ')}]`;
    }
    const lower = this.lowerRungs.map(String).join(', ');
    const upper = [...this.upperRungs].reverse().map(String).join(', ');
    return `[${lower}${GAP}${upper}]`;
  }
}

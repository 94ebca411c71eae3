import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { CompletionSearch, byProximity } from './completion-search.js';
import { GraphOracle } from '../graph/graph-oracle.js';
import { Ladder } from '../ladder/ladder.js';
import { FakeWikiTransport, fillers, type FakeGraph } from '../transport/__test-helpers.js';
import { configureLogger } from '../../shared/logger.js';

function setup(graph: FakeGraph) {
  const transport = new FakeWikiTransport(graph);
  const oracle = new GraphOracle({ transport, queryLimit: 500, fetchLimit: 2 });
  return { transport, oracle };
}

describe('CompletionSearch', () => {
  beforeAll(() => {
    configureLogger({ level: 'silent' });
  });

  afterAll(() => {
    configureLogger({ level: 'warn' });
  });

  it('closes the ladder through a page in the net', async () => {
    const { oracle } = setup({
      links: { A: ['B'], B: ['C'], C: ['D'] },
      backlinks: {
        D: ['C', ...fillers('D', 999)],
        C: ['B', 'Other'],
      },
    });
    const ladder = await Ladder.create(oracle, 'A', 'D');

    const done = await new CompletionSearch(oracle).run(ladder);

    expect(done.isComplete()).toBe(true);
    expect(done.toSequence()).toEqual(['A', 'B', 'C', 'D']);
  });

  it('expands the ladder closest to the end first', async () => {
    const { oracle, transport } = setup({
      links: {
        Start: ['P', 'Q'],
        P: ['P1'],
        Q: ['Q1', 'Shared1', 'Shared2'],
        Q1: ['End'],
        End: ['Shared1', 'Shared2'],
      },
      backlinks: { End: ['Z'] },
    });
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const done = await new CompletionSearch(oracle).run(ladder);

    expect(done.toSequence()).toEqual(['Start', 'Q', 'Q1', 'End']);
    expect(transport.titles('page')).not.toContain('P1');
  });

  it('returns the best incomplete ladder when the search runs dry', async () => {
    const { oracle } = setup({
      links: {
        Start: ['M'],
        M: ['Shared'],
        End: ['Shared'],
      },
      backlinks: { End: ['Z'] },
    });
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const best = await new CompletionSearch(oracle).run(ladder);

    expect(best.isComplete()).toBe(false);
    expect(best.toSequence()).toEqual(['Start', 'M', null, 'End']);
    expect(best.proximity).toBe(1);
  });

  it('returns a complete ladder without searching', async () => {
    const { oracle, transport } = setup({ links: { A: ['B'] } });
    const ladder = await Ladder.create(oracle, 'A', 'B');

    expect(await new CompletionSearch(oracle).run(ladder)).toBe(ladder);
    expect(transport.count('inbound')).toBe(0);
  });

  it('stops at maxExpansions', async () => {
    const { oracle } = setup({ links: { A: ['B'], B: ['C'] }, backlinks: { C: [] } });
    const ladder = await Ladder.create(oracle, 'A', 'C');

    const result = await new CompletionSearch(oracle, { maxExpansions: 0 }).run(ladder);

    expect(result).toBe(ladder);
  });
});

describe('byProximity', () => {
  it('orders higher proximity first, then shorter ladders', async () => {
    const { oracle } = setup({
      links: {
        S: ['X', 'Y'],
        X: ['K1', 'K2'],
        Y: ['K1'],
        E: ['K1', 'K2'],
      },
      backlinks: { E: [] },
    });
    const base = await Ladder.create(oracle, 'S', 'E');
    const viaX = await base.addLowerRung('X');
    const viaY = await base.addLowerRung('Y');
    if (viaX.status !== 'applied' || viaY.status !== 'applied') {
      throw new Error('expected applied rungs');
    }

    expect(viaX.ladder.proximity).toBe(2);
    expect(viaY.ladder.proximity).toBe(1);
    expect(byProximity(viaX.ladder, viaY.ladder)).toBeLessThan(0);
    expect(byProximity(base, viaY.ladder)).toBeGreaterThan(0);
    expect(byProximity(base, base)).toBe(0);
  });
});

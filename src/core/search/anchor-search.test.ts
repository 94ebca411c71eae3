import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AnchorSearch, isYearInPlace } from './anchor-search.js';
import { GraphOracle } from '../graph/graph-oracle.js';
import { Ladder } from '../ladder/ladder.js';
import { FakeWikiTransport, fillers, type FakeGraph } from '../transport/__test-helpers.js';
import { configureLogger } from '../../shared/logger.js';

function setup(graph: FakeGraph) {
  const transport = new FakeWikiTransport(graph);
  const oracle = new GraphOracle({ transport, queryLimit: 500, fetchLimit: 2 });
  return { transport, oracle };
}

const graph: FakeGraph = {
  links: {
    Start: ['Elsewhere'],
    Hub: ['End'],
    '1999 in Denmark': ['End'],
  },
  backlinks: {
    End: ['1999 in Denmark', 'Hub'],
    Hub: fillers('Hub', 5),
    '1999 in Denmark': fillers('Year', 4),
  },
};

describe('isYearInPlace', () => {
  it('matches year-in-place titles only', () => {
    expect(isYearInPlace('1809 in Denmark')).toBe(true);
    expect(isYearInPlace('2004 in film')).toBe(true);
    expect(isYearInPlace('Denmark in 1809')).toBe(false);
    expect(isYearInPlace("1995 Men's Curling Championship")).toBe(false);
  });
});

describe('AnchorSearch', () => {
  beforeAll(() => {
    configureLogger({ level: 'silent' });
  });

  afterAll(() => {
    configureLogger({ level: 'warn' });
  });

  it('hangs the most popular backlink under the end page', async () => {
    const { oracle, transport } = setup(graph);
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const anchored = await new AnchorSearch(oracle, { anchorThreshold: 3 }).run(ladder);

    expect(anchored.upperFrontier()).toBe('Hub');
    expect(anchored.toSequence()).toEqual(['Start', null, 'Hub', 'End']);
    expect(transport.titles('inbound')).not.toContain('1999 in Denmark');
  });

  it('returns the ladder itself when the end is popular enough', async () => {
    const { oracle } = setup(graph);
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const anchored = await new AnchorSearch(oracle, { anchorThreshold: 2 }).run(ladder);

    expect(anchored).toBe(ladder);
  });

  it('returns a complete ladder unchanged', async () => {
    const { oracle, transport } = setup(graph);
    const ladder = await Ladder.create(oracle, 'Hub', 'End');

    const anchored = await new AnchorSearch(oracle, { anchorThreshold: 1000 }).run(ladder);

    expect(anchored).toBe(ladder);
    expect(transport.count('inbound')).toBe(0);
  });

  it('returns the original ladder when no anchor is reachable', async () => {
    const { oracle } = setup({
      links: { Lonely: ['End'] },
      backlinks: { End: ['Lonely'], Lonely: [] },
    });
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const anchored = await new AnchorSearch(oracle, { anchorThreshold: 3 }).run(ladder);

    expect(anchored).toBe(ladder);
  });

  it('uses a custom noise predicate', async () => {
    const { oracle } = setup(graph);
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const anchored = await new AnchorSearch(oracle, {
      anchorThreshold: 3,
      isNoise: (title) => title === 'Hub',
    }).run(ladder);

    expect(anchored.upperFrontier()).toBe('1999 in Denmark');
  });

  it('stops at maxExpansions', async () => {
    const { oracle, transport } = setup(graph);
    const ladder = await Ladder.create(oracle, 'Start', 'End');

    const anchored = await new AnchorSearch(oracle, {
      anchorThreshold: 3,
      maxExpansions: 0,
    }).run(ladder);

    expect(anchored).toBe(ladder);
    expect(transport.titles('inbound')).toEqual(['End']);
  });
});

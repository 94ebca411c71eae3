import { describe, it, expect } from 'vitest';
import { PriorityQueue } from './priority-queue.js';

function drain<T>(queue: PriorityQueue<T>): T[] {
  const out: T[] = [];
  for (let v = queue.pop(); v !== undefined; v = queue.pop()) {
    out.push(v);
  }
  return out;
}

describe('PriorityQueue', () => {
  it('pops in comparator order', () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 2, 9, 3, 8, 7, 6]) queue.push(n);

    expect(queue.size).toBe(9);
    expect(drain(queue)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(queue.isEmpty()).toBe(true);
  });

  it('supports max ordering through the comparator', () => {
    const queue = new PriorityQueue<number>((a, b) => b - a);
    for (const n of [3, 10, 7]) queue.push(n);

    expect(queue.peek()).toBe(10);
    expect(drain(queue)).toEqual([10, 7, 3]);
  });

  it('keeps insertion order for equal items', () => {
    const queue = new PriorityQueue<{ key: string; rank: number }>(
      (a, b) => a.rank - b.rank,
    );
    queue.push({ key: 'a', rank: 2 });
    queue.push({ key: 'b', rank: 1 });
    queue.push({ key: 'c', rank: 2 });
    queue.push({ key: 'd', rank: 1 });
    queue.push({ key: 'e', rank: 2 });

    expect(drain(queue).map((x) => x.key)).toEqual(['b', 'd', 'a', 'c', 'e']);
  });

  it('returns undefined when empty', () => {
    const queue = new PriorityQueue<string>((a, b) => a.localeCompare(b));

    expect(queue.pop()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
  });

  it('interleaves pushes and pops', () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);
    queue.push(4);
    queue.push(2);
    expect(queue.pop()).toBe(2);
    queue.push(1);
    queue.push(3);
    expect(drain(queue)).toEqual([1, 3, 4]);
  });
});

/**
 * Binary heap ordered by a comparator
 *
 * `compare(a, b) < 0` means `a` is served first. Items the comparator
 * considers equal come out in insertion order.
 */

export type Comparator<T> = (a: T, b: T) => number;

interface HeapEntry<T> {
  value: T;
  seq: number;
}

export class PriorityQueue<T> {
  private heap: HeapEntry<T>[] = [];
  private nextSeq = 0;

  constructor(private readonly compare: Comparator<T>) {}

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(value: T): void {
    this.heap.push({ value, seq: this.nextSeq++ });
    this.bubbleUp(this.heap.length - 1);
  }

  peek(): T | undefined {
    return this.heap[0]?.value;
  }

  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();

    if (this.heap.length > 0 && last) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return top?.value;
  }

  private before(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    const order = this.compare(a.value, b.value);
    return order < 0 || (order === 0 && a.seq < b.seq);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      const parent = this.heap[parentIndex];
      const current = this.heap[index];

      if (!parent || !current || !this.before(current, parent)) break;

      this.heap[parentIndex] = current;
      this.heap[index] = parent;
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.heap.length;

    for (;;) {
      const left = 2 * index + 1;
      const right = left + 1;
      let best = index;

      const leftEntry = this.heap[left];
      const bestEntry = this.heap[best];
      if (left < length && leftEntry && bestEntry && this.before(leftEntry, bestEntry)) {
        best = left;
      }
      const rightEntry = this.heap[right];
      const newBest = this.heap[best];
      if (right < length && rightEntry && newBest && this.before(rightEntry, newBest)) {
        best = right;
      }

      if (best === index) break;

      const current = this.heap[index];
      const swap = this.heap[best];
      if (!current || !swap) break;
      this.heap[index] = swap;
      this.heap[best] = current;
      index = best;
    }
  }
}

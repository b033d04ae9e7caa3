import type { Cell } from '../types.js';

export interface FrontierEntry {
  cell: Cell;
  // path cost when the entry was pushed; used to spot stale heap entries
  cost: number;
}

export interface Frontier {
  push(entry: FrontierEntry, priority: number): void;
  popNext(): FrontierEntry | undefined;
  isEmpty(): boolean;
  readonly size: number;
}

export class FifoFrontier implements Frontier {
  #items: FrontierEntry[] = [];
  #head = 0;

  get size(): number {
    return this.#items.length - this.#head;
  }

  push(entry: FrontierEntry): void {
    this.#items.push(entry);
  }

  popNext(): FrontierEntry | undefined {
    if (this.isEmpty()) return undefined;
    const entry = this.#items[this.#head];
    this.#head++;
    // compact once the consumed prefix dominates
    if (this.#head > 64 && this.#head * 2 > this.#items.length) {
      this.#items = this.#items.slice(this.#head);
      this.#head = 0;
    }
    return entry;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }
}

export class LifoFrontier implements Frontier {
  #items: FrontierEntry[] = [];

  get size(): number {
    return this.#items.length;
  }

  push(entry: FrontierEntry): void {
    this.#items.push(entry);
  }

  popNext(): FrontierEntry | undefined {
    return this.#items.pop();
  }

  isEmpty(): boolean {
    return this.#items.length === 0;
  }
}

interface HeapNode {
  priority: number;
  seq: number;
  entry: FrontierEntry;
}

/**
 * Binary min-heap ordered by priority, then by insertion sequence so equal
 * priorities pop first-in first-out.
 */
export class MinHeapFrontier implements Frontier {
  #nodes: HeapNode[] = [];
  #seq = 0;

  get size(): number {
    return this.#nodes.length;
  }

  push(entry: FrontierEntry, priority: number): void {
    this.#nodes.push({ priority, seq: this.#seq++, entry });
    this.#bubbleUp(this.#nodes.length - 1);
  }

  popNext(): FrontierEntry | undefined {
    const top = this.#nodes[0];
    if (!top) return undefined;
    const last = this.#nodes.pop();
    if (last && this.#nodes.length > 0) {
      this.#nodes[0] = last;
      this.#bubbleDown(0);
    }
    return top.entry;
  }

  peekPriority(): number | undefined {
    return this.#nodes[0]?.priority;
  }

  isEmpty(): boolean {
    return this.#nodes.length === 0;
  }

  #less(i: number, j: number): boolean {
    const a = this.#nodes[i];
    const b = this.#nodes[j];
    return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
  }

  #swap(i: number, j: number): void {
    [this.#nodes[i], this.#nodes[j]] = [this.#nodes[j], this.#nodes[i]];
  }

  #bubbleUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.#less(i, parent)) break;
      this.#swap(i, parent);
      i = parent;
    }
  }

  #bubbleDown(i: number): void {
    const n = this.#nodes.length;
    while (true) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.#less(left, smallest)) smallest = left;
      if (right < n && this.#less(right, smallest)) smallest = right;
      if (smallest === i) break;
      this.#swap(i, smallest);
      i = smallest;
    }
  }
}

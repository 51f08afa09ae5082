/**
 * CandidateQueue - Binary min-heap of SPF vertex handles with decrease-key
 */

import type { VertexHandle } from './SPFTree';

export type HandleComparator = (a: VertexHandle, b: VertexHandle) => number;

export class CandidateQueue {
  private heap: VertexHandle[] = [];
  /** handle → index in heap */
  private position: Map<VertexHandle, number> = new Map();

  constructor(private readonly compare: HandleComparator) {}

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  has(handle: VertexHandle): boolean {
    return this.position.has(handle);
  }

  push(handle: VertexHandle): void {
    if (this.position.has(handle)) {
      this.update(handle);
      return;
    }
    this.heap.push(handle);
    this.position.set(handle, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Remove and return the minimum handle, or null when empty.
   */
  pop(): VertexHandle | null {
    if (this.heap.length === 0) return null;
    const top = this.heap[0];
    const last = this.heap.pop();
    this.position.delete(top);
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.position.set(last, 0);
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Restore heap order after the key of `handle` has decreased.
   */
  update(handle: VertexHandle): void {
    const i = this.position.get(handle);
    if (i === undefined) return;
    this.siftUp(i);
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(this.heap[i], this.heap[parent]) >= 0) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.compare(this.heap[left], this.heap[smallest]) < 0) smallest = left;
      if (right < n && this.compare(this.heap[right], this.heap[smallest]) < 0) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.position.set(b, i);
    this.position.set(a, j);
  }
}

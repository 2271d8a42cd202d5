import { describe, it, expect } from 'vitest';
import { MinHeap } from './minHeap.js';

describe('MinHeap', () => {
  it('should pop elements in comparator order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const value of [5, 1, 9, 3, 7, 3]) {
      heap.push(value);
    }

    const popped: number[] = [];
    let next = heap.pop();
    while (next !== undefined) {
      popped.push(next);
      next = heap.pop();
    }

    expect(popped).toEqual([1, 3, 3, 5, 7, 9]);
    expect(heap.size).toBe(0);
  });

  it('should honor a reversed comparator', () => {
    const heap = new MinHeap<number>((a, b) => b - a);
    [2, 8, 4].forEach(v => heap.push(v));
    expect(heap.peek()).toBe(8);
  });

  it('should replace the root and restore order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    [4, 6, 8].forEach(v => heap.push(v));

    expect(heap.replaceTop(10)).toBe(4);
    expect(heap.peek()).toBe(6);
    expect(heap.size).toBe(3);
  });

  it('should return undefined when empty', () => {
    const heap = new MinHeap<string>((a, b) => a.localeCompare(b));
    expect(heap.peek()).toBeUndefined();
    expect(heap.pop()).toBeUndefined();
    expect(heap.replaceTop('a')).toBeUndefined();
    expect(heap.toHeapArray()).toEqual(['a']);
  });
});

/**
 * Array-backed binary heap ordered by a caller-supplied comparator.
 * The element for which `compare` is smallest sits at the root.
 */
export class MinHeap<T> {
  private items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  get size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const items = this.items;
    if (items.length === 0) {
      return undefined;
    }

    const top = items[0];
    const last = items.pop();
    if (items.length > 0 && last !== undefined) {
      items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Replace the root with `item` and restore heap order.
   * Cheaper than pop() followed by push().
   */
  replaceTop(item: T): T | undefined {
    if (this.items.length === 0) {
      this.items.push(item);
      return undefined;
    }
    const top = this.items[0];
    this.items[0] = item;
    this.siftDown(0);
    return top;
  }

  /**
   * Snapshot of the backing array in heap order (not sorted).
   */
  toHeapArray(): T[] {
    return [...this.items];
  }

  private siftUp(index: number): void {
    const items = this.items;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (this.compare(items[index], items[parent]) >= 0) {
        break;
      }
      [items[index], items[parent]] = [items[parent], items[index]];
      index = parent;
    }
  }

  private siftDown(index: number): void {
    const items = this.items;
    const length = items.length;

    for (;;) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;

      if (left < length && this.compare(items[left], items[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && this.compare(items[right], items[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === index) {
        return;
      }

      [items[index], items[smallest]] = [items[smallest], items[index]];
      index = smallest;
    }
  }
}

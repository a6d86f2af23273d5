interface PurgeRecord<T> {
  timestamp: number;
  payload: T;
  seq: number;
}

export interface PurgeQueueItem<T> {
  timestamp: number;
  payload: T;
}

/**
 * Binary min-heap ordered by timestamp, FIFO among equal timestamps.
 * Records are never updated in place; callers reconcile stale ones when they pop them.
 */
export class PurgeQueue<T> {
  private readonly heap: PurgeRecord<T>[] = [];
  private seq = 0;

  get length(): number {
    return this.heap.length;
  }

  push(timestamp: number, payload: T): void {
    this.heap.push({ timestamp, payload, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);
  }

  peek(): PurgeQueueItem<T> | undefined {
    const head = this.heap[0];
    return head ? { timestamp: head.timestamp, payload: head.payload } : undefined;
  }

  pop(): PurgeQueueItem<T> | undefined {
    const head = this.heap[0];
    if (!head) return undefined;
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return { timestamp: head.timestamp, payload: head.payload };
  }

  private less(a: PurgeRecord<T>, b: PurgeRecord<T>): boolean {
    return a.timestamp < b.timestamp || (a.timestamp === b.timestamp && a.seq < b.seq);
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.less(this.heap[child], this.heap[parent])) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const size = this.heap.length;
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < size && this.less(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < size && this.less(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === parent) return;
      this.swap(parent, smallest);
      parent = smallest;
    }
  }
}

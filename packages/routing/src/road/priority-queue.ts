/** Binary min-heap keyed by distance, for Dijkstra over integer node indices */
export class MinPriorityQueue {
  private heap: Array<{ node: number; distance: number }> = [];

  push(value: { node: number; distance: number }): void {
    this.heap.push(value);
    this.bubbleUp(this.heap.length - 1);
  }

  pop(): { node: number; distance: number } | null {
    const first = this.heap[0];
    if (!first) return null;
    const last = this.heap.pop();

    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return first;
  }

  get size(): number {
    return this.heap.length;
  }

  private distanceAt(i: number): number {
    return this.heap[i]?.distance ?? Number.POSITIVE_INFINITY;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (!a || !b) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }

  private bubbleUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = Math.floor((i - 1) / 2);
      if (this.distanceAt(parent) <= this.distanceAt(i)) break;
      this.swap(parent, i);
      i = parent;
    }
  }

  private bubbleDown(index: number): void {
    let i = index;
    while (true) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;

      if (left < this.heap.length && this.distanceAt(left) < this.distanceAt(smallest)) {
        smallest = left;
      }

      if (right < this.heap.length && this.distanceAt(right) < this.distanceAt(smallest)) {
        smallest = right;
      }

      if (smallest === i) break;
      this.swap(smallest, i);
      i = smallest;
    }
  }
}

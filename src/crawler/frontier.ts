const DEFAULT_CAPACITY = 16;

/**
 * Double-ended queue of URLs awaiting a visit, backed by a growable ring
 * buffer. Removal is always from the front; the two push methods decide
 * whether a URL jumps the line (depth-first) or waits its turn
 * (breadth-first).
 *
 * The same URL may be queued more than once.
 */
export class Frontier {
  private buffer: Array<string | undefined>;
  private head = 0;
  private count = 0;

  constructor(initialCapacity: number = DEFAULT_CAPACITY) {
    this.buffer = new Array<string | undefined>(Math.max(1, initialCapacity)).fill(undefined);
  }

  /** Insert `url` so that it is the next one popped. */
  pushDepthFirst(url: string): void {
    this.grow();
    this.head = (this.head - 1 + this.buffer.length) % this.buffer.length;
    this.buffer[this.head] = url;
    this.count++;
  }

  /** Insert `url` behind every URL currently pending. */
  pushBreadthFirst(url: string): void {
    this.grow();
    this.buffer[(this.head + this.count) % this.buffer.length] = url;
    this.count++;
  }

  /** Remove and return the next URL, or undefined when empty. */
  pop(): string | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const url = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;
    return url;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  get size(): number {
    return this.count;
  }

  private grow(): void {
    if (this.count < this.buffer.length) {
      return;
    }
    const next = new Array<string | undefined>(this.buffer.length * 2).fill(undefined);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    this.buffer = next;
    this.head = 0;
  }
}

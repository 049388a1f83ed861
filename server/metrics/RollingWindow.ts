const EPS = 1e-12;

/**
 * Fixed-capacity ring of samples with running sums. Eviction subtracts the
 * outgoing value before the new one is added, so every aggregate is O(1).
 */
export class RingSum {
  private readonly values: number[];
  private head = 0;
  private size = 0;
  private total = 0;

  constructor(private readonly capacity: number) {
    this.capacity = Math.max(1, Math.trunc(capacity));
    this.values = new Array<number>(this.capacity).fill(0);
  }

  /** Appends a sample and returns the evicted one, if the ring was full. */
  add(value: number): number | null {
    const v = Number.isFinite(value) ? value : 0;
    let evicted: number | null = null;
    if (this.size === this.capacity) {
      evicted = this.values[this.head];
      this.total -= evicted;
      this.values[this.head] = v;
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.values[(this.head + this.size) % this.capacity] = v;
      this.size += 1;
    }
    this.total += v;
    return evicted;
  }

  sum(): number {
    return this.total;
  }

  count(): number {
    return this.size;
  }

  isFull(): boolean {
    return this.size === this.capacity;
  }

  mean(): number {
    if (this.size <= 0) return 0;
    return this.total / this.size;
  }

  /** `back(0)` is the newest sample, `back(count() - 1)` the oldest. */
  back(offset: number): number {
    if (offset < 0 || offset >= this.size) return 0;
    return this.values[(this.head + this.size - 1 - offset) % this.capacity];
  }

  toArray(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.size; i += 1) {
      out.push(this.values[(this.head + i) % this.capacity]);
    }
    return out;
  }
}

export class RingStats {
  private readonly ring: RingSum;
  private sumSq = 0;

  constructor(capacity: number) {
    this.ring = new RingSum(capacity);
  }

  add(value: number): void {
    const v = Number.isFinite(value) ? value : 0;
    const evicted = this.ring.add(v);
    if (evicted !== null) {
      this.sumSq -= evicted * evicted;
    }
    this.sumSq += v * v;
  }

  count(): number {
    return this.ring.count();
  }

  sum(): number {
    return this.ring.sum();
  }

  mean(): number {
    return this.ring.mean();
  }

  /** Population variance via E[X^2] - E[X]^2, floored at zero. */
  variance(): number {
    const c = this.ring.count();
    if (c <= 0) return 0;
    const mean = this.ring.sum() / c;
    const variance = (this.sumSq / c) - (mean * mean);
    return variance > 0 ? variance : 0;
  }

  std(): number {
    return Math.sqrt(this.variance());
  }

  zScore(value: number, minStd: number = EPS): number {
    const std = this.std();
    if (std <= minStd) return 0;
    return (value - this.mean()) / std;
  }

  back(offset: number): number {
    return this.ring.back(offset);
  }

  toArray(): number[] {
    return this.ring.toArray();
  }
}

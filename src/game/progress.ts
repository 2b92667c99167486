/**
 * Progress Tracker - a bounded work counter with one-shot milestones.
 */

export type ThresholdCallback = (threshold: number) => void;

export class ProgressTracker {
  readonly max: number;
  private current = 0;
  private thresholds: number[];
  private crossed = new Set<number>();
  private listeners = new Set<ThresholdCallback>();

  constructor(max: number, thresholds: readonly number[] = []) {
    if (!(max > 0)) {
      throw new Error(`Progress max must be positive, got ${max}`);
    }
    this.max = max;
    this.thresholds = [...new Set(thresholds)]
      .filter(t => t > 0 && t <= max)
      .sort((a, b) => a - b);
  }

  get value(): number {
    return this.current;
  }

  get fraction(): number {
    return this.current / this.max;
  }

  get complete(): boolean {
    return this.current >= this.max;
  }

  /**
   * Add work. Negative and non-finite amounts are ignored; the total is
   * clamped to max. Returns the amount actually applied.
   */
  add(amount: number): number {
    if (this.complete || !Number.isFinite(amount) || amount <= 0) return 0;

    const before = this.current;
    this.current = Math.min(this.max, before + amount);

    for (const threshold of this.thresholds) {
      if (this.crossed.has(threshold) || this.current < threshold) continue;
      this.crossed.add(threshold);
      for (const cb of [...this.listeners]) {
        cb(threshold);
      }
    }

    return this.current - before;
  }

  onThresholdCrossed(cb: ThresholdCallback): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  hasCrossed(threshold: number): boolean {
    return this.crossed.has(threshold);
  }
}

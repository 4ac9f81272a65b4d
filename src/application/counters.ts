/**
 * Named numeric counters owned by one pipeline component.
 *
 * Each ingress or processor instance gets its own set, so several
 * pipelines in one process never share state. Updates are synchronous;
 * concurrent async tasks may interleave between reads and writes, which
 * only affects metric accuracy.
 */
export class Counters<K extends string> {
  private values: Record<K, number>;
  private readonly initial: Record<K, number>;

  constructor(initial: Record<K, number>) {
    this.initial = { ...initial };
    this.values = { ...initial };
  }

  increment(key: K, by = 1): void {
    this.values[key] += by;
  }

  set(key: K, value: number): void {
    this.values[key] = value;
  }

  get(key: K): number {
    return this.values[key];
  }

  /** Copy of the current values. */
  snapshot(): Record<K, number> {
    return { ...this.values };
  }

  reset(): void {
    this.values = { ...this.initial };
  }
}

/** Formats `part / whole` as a percentage with one decimal, "0.0%" when empty. */
export function formatRate(part: number, whole: number): string {
  if (whole <= 0) return '0.0%';
  return `${((part / whole) * 100).toFixed(1)}%`;
}

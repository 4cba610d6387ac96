/** Running mean and sample variance over a stream of values (Welford). */
export class RunningStats {
  count = 0;
  mean = 0;
  private m2 = 0;

  add(value: number): void {
    this.count += 1;
    const before = value - this.mean;
    this.mean += before / this.count;
    this.m2 += before * (value - this.mean);
  }

  get variance(): number {
    return this.count < 2 ? 0 : this.m2 / (this.count - 1);
  }

  get stdev(): number {
    return Math.sqrt(this.variance);
  }

  /** Normal-approximation interval around the mean; `[0, 0]` before any value. */
  interval(z = 1.96): [number, number] {
    if (this.count === 0) return [0, 0];
    const margin = (this.stdev / Math.sqrt(this.count)) * z;
    return [this.mean - margin, this.mean + margin];
  }
}

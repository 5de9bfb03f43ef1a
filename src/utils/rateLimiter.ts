// Spaces out calls to one external dependency: at least minIntervalMs
// (plus up to jitterMs) between the end of one wait and the next call.
export class RateLimiter {
  private last = 0;

  constructor(
    private readonly minIntervalMs = 2000,
    private readonly jitterMs = 0,
  ) {}

  async wait(): Promise<void> {
    const interval = this.minIntervalMs + (this.jitterMs > 0 ? Math.floor(Math.random() * this.jitterMs) : 0);
    const elapsed = Date.now() - this.last;
    if (this.last > 0 && elapsed < interval) {
      await new Promise((r) => setTimeout(r, interval - elapsed));
    }
    this.last = Date.now();
  }
}

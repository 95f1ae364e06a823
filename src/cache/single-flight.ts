/**
 * Collapses concurrent misses on the same key into one upstream call.
 *
 * The first caller for a key runs `fn`; callers arriving before it settles
 * share its promise. The slot is released on settle either way, so a failed
 * call is never reused.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  async run(key: string, fn: () => Promise<T>): Promise<{ value: T; shared: boolean }> {
    const existing = this.inflight.get(key);
    if (existing) {
      return { value: await existing, shared: true };
    }
    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return { value: await promise, shared: false };
  }

  stats(): { inflight: number } {
    return { inflight: this.inflight.size };
  }
}

/**
 * Per-key trailing debounce: every `schedule` call restarts the key's timer,
 * and only the action from the last call fires once the window passes quietly.
 */
export class Debouncer<K> {
  private readonly pending = new Map<K, ReturnType<typeof setTimeout>>();

  constructor(private readonly windowMs: number) {}

  public schedule(key: K, action: () => void): void {
    const existing = this.pending.get(key);
    if (existing) {
      clearTimeout(existing);
    }
    const timer = setTimeout(() => {
      // A newer schedule() would have replaced this timer.
      if (this.pending.get(key) !== timer) return;
      this.pending.delete(key);
      action();
    }, this.windowMs);
    this.pending.set(key, timer);
  }

  public get size(): number {
    return this.pending.size;
  }

  public cancelAll(): void {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }
}

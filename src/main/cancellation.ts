/**
 * One-shot stop flag shared by the capture tasks of a session.
 * The first `set()` wakes every waiter; later calls do nothing.
 */
export class CancellationSignal {
  private done = false;
  private readonly waiters: Array<() => void> = [];
  private readonly settled: Promise<void>;

  constructor() {
    this.settled = new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get isSet(): boolean {
    return this.done;
  }

  set(): void {
    if (this.done) return;
    this.done = true;
    const pending = this.waiters.splice(0);
    pending.forEach((wake) => wake());
  }

  wait(): Promise<void> {
    return this.settled;
  }

  /** Runs `fn` once the flag is set; returns a function that drops the listener. */
  onSet(fn: () => void): () => void {
    if (this.done) {
      fn();
      return () => {};
    }
    this.waiters.push(fn);
    return () => {
      const idx = this.waiters.indexOf(fn);
      if (idx >= 0) this.waiters.splice(idx, 1);
    };
  }
}

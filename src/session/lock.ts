/**
 * Single gate serializing every session operation.
 *
 * Each caller chains onto the current tail synchronously (before any await),
 * so two callers can never enter the critical section together and waiters
 * run in FIFO order.
 *
 * @example
 * ```typescript
 * const gate = new SerialGate();
 * await gate.run(async () => { ... });
 * ```
 */
export class SerialGate {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Run `fn` once every earlier caller has finished.
   * Errors from `fn` are re-thrown after the gate is released.
   */
  public async run<T>(fn: () => Promise<T>): Promise<T> {
    const predecessor = this.tail;

    let release: () => void = () => {};
    const ours = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = ours;
    this.waiting++;

    try {
      await predecessor;
      return await fn();
    } finally {
      this.waiting--;
      release();
    }
  }

  /**
   * True while an operation holds or waits for the gate
   */
  public isBusy(): boolean {
    return this.waiting > 0;
  }
}

/**
 * Dispatch strategies
 *
 * USB work runs on a dedicated lane: one task at a time, each started on a
 * fresh macrotask so it never executes inside the caller's tick. Network work
 * is awaited directly.
 */

import type { TransportKind } from "../session/types";
import type { RawHandle } from "./transport";

export interface DispatchStrategy {
  readonly name: "lane" | "direct";
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Await the task in place
 */
export class DirectDispatch implements DispatchStrategy {
  readonly name = "direct";

  run<T>(task: () => Promise<T>): Promise<T> {
    return task();
  }
}

/**
 * Serial lane, tasks start via setImmediate in FIFO order
 */
export class LaneDispatch implements DispatchStrategy {
  readonly name = "lane";
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    const start = this.tail.then(
      () =>
        new Promise<void>((resolve) => {
          setImmediate(resolve);
        })
    );
    const result = start.then(task);
    this.pending++;
    // Lane advances whether the task resolves or rejects
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Tasks queued or running
   */
  size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}

export function strategyFor(kind: TransportKind): DispatchStrategy {
  return kind === "usb" ? new LaneDispatch() : new DirectDispatch();
}

/**
 * Handle whose calls go through a dispatch strategy
 */
export class DispatchedHandle implements RawHandle {
  readonly kind: TransportKind;
  readonly strategy: DispatchStrategy;
  private raw: RawHandle;

  constructor(kind: TransportKind, raw: RawHandle, strategy?: DispatchStrategy) {
    this.kind = kind;
    this.raw = raw;
    this.strategy = strategy ?? strategyFor(kind);
  }

  get disconnected(): Promise<void> {
    return this.raw.disconnected;
  }

  shell(command: string): Promise<string> {
    return this.strategy.run(() => this.raw.shell(command));
  }

  shellBytes(command: string): Promise<Uint8Array> {
    return this.strategy.run(() => this.raw.shellBytes(command));
  }

  enableTcpListener(port: number): Promise<string> {
    return this.strategy.run(() => this.raw.enableTcpListener(port));
  }

  push(remotePath: string, data: Uint8Array): Promise<void> {
    return this.strategy.run(() => this.raw.push(remotePath, data));
  }

  pull(remotePath: string): Promise<Uint8Array> {
    return this.strategy.run(() => this.raw.pull(remotePath));
  }

  close(): Promise<void> {
    return this.strategy.run(() => this.raw.close());
  }
}

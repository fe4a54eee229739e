export type Dispatch = (op: () => void) => void;

export type SettleDebouncerOptions = {
  settleIntervalMs: number;
  /** Hands a deferred operation to the UI-owning task queue. Defaults to running it in place. */
  dispatch?: Dispatch;
};

const runInPlace: Dispatch = (op) => op();

/**
 * Single-slot debouncer.
 *
 * When idle, `run` executes immediately and opens a settle window. Calls made while a
 * window is open replace the pending operation and restart the window; the latest one
 * runs when the window closes. Once the window closes, with or without an operation,
 * the debouncer is idle again.
 */
export class SettleDebouncer {
  private readonly settleIntervalMs: number;
  private readonly dispatch: Dispatch;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingOp: (() => void) | null = null;

  constructor({ settleIntervalMs, dispatch = runInPlace }: SettleDebouncerOptions) {
    this.settleIntervalMs = settleIntervalMs;
    this.dispatch = dispatch;
  }

  get isPending(): boolean {
    return this.timer !== null;
  }

  run(op: () => void): void {
    if (this.timer === null) {
      this.openWindow(null);
      op();
      return;
    }
    this.cancelTimer();
    this.openWindow(op);
  }

  /** Drops the outstanding timer; its operation never runs. */
  cancel(): void {
    this.cancelTimer();
    this.pendingOp = null;
  }

  private openWindow(op: (() => void) | null): void {
    this.pendingOp = op;
    this.timer = setTimeout(() => this.onSettled(), this.settleIntervalMs);
  }

  private onSettled(): void {
    this.timer = null;
    const op = this.pendingOp;
    this.pendingOp = null;
    if (!op) return;
    this.dispatch(op);
  }

  private cancelTimer(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }
}

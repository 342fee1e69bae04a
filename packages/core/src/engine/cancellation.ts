// packages/core/src/engine/cancellation.ts -- Run abort support

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;
  private callbacks = new Set<() => void>();

  /**
   * Signal cancellation. Idempotent. Every callback runs even if one throws;
   * callback errors are rethrown together afterwards.
   */
  cancel(reason = 'Run was cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    const errors: unknown[] = [];
    for (const cb of this.callbacks) {
      try {
        cb();
      } catch (err) {
        errors.push(err);
      }
    }
    this.callbacks.clear();
    if (errors.length > 0) {
      throw new AggregateError(errors, 'Cancellation callbacks failed');
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  /** Throw if already cancelled. Checked at every tick boundary. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.cancelReason ?? 'Run was cancelled');
    }
  }

  /**
   * Register a callback to run on cancellation.
   * Deduplicated by reference. If already cancelled, fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Resolves after `ms`, or early on cancellation.
   * Returns true if the sleep completed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }

      let timer: ReturnType<typeof setTimeout> | undefined;
      const onCancelHandler = () => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(false);
      };

      timer = setTimeout(() => {
        this.callbacks.delete(onCancelHandler);
        resolve(true);
      }, ms);

      this.onCancel(onCancelHandler);
    });
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}

/**
 * Cooperative cancellation for one unit of work. Work checks `isCancelled`
 * after every suspension point; `sleep` and `race` stop waiting as soon as
 * the token is cancelled.
 */
export class CancellationToken {
  private cancelled = false;
  private wake: () => void = () => undefined;
  private readonly whenCancelled = new Promise<void>((resolve) => {
    this.wake = resolve;
  });

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.wake();
  }

  /**
   * Settles with `promise`, or with `null` once the token is cancelled.
   * The caller owns handling of a late rejection.
   */
  async race<T>(promise: Promise<T>): Promise<T | null> {
    if (this.cancelled) return null;
    const result = await Promise.race([
      promise,
      this.whenCancelled.then(() => null),
    ]);
    return this.cancelled ? null : result;
  }

  /**
   * Resolves `true` after `ms`, or `false` as soon as the token is
   * cancelled.
   */
  async sleep(ms: number): Promise<boolean> {
    if (this.cancelled) return false;
    let clearTimer: () => void = () => undefined;
    const slept = new Promise<true>((resolve) => {
      const timer = setTimeout(() => resolve(true), ms);
      clearTimer = () => clearTimeout(timer);
    });
    const result = await this.race(slept);
    clearTimer();
    return result === true;
  }
}

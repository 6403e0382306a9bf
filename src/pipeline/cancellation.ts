/**
 * Cooperative cancellation flag. Setting it never interrupts work in flight;
 * holders check it at their own checkpoints.
 */
export class CancellationToken {
  private cancelled = false;

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }

  reset(): void {
    this.cancelled = false;
  }
}

/**
 * Single-shot debounce timer. Scheduling again restarts the wait instead of
 * stacking a second run, so a burst of edits validates once it settles.
 */
export class ValidationScheduler {
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(
    private readonly delayMs: number,
    private readonly task: () => void
  ) {}

  get pending(): boolean {
    return this.timer !== undefined;
  }

  schedule(): void {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.task();
    }, this.delayMs);
  }

  /**
   * Runs a pending task now.
   * @returns whether a task was pending
   */
  flush(): boolean {
    if (!this.pending) return false;
    this.cancel();
    this.task();
    return true;
  }

  cancel(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

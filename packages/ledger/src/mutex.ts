/**
 * Serializes async work: each task starts after the previous one settles.
 * A failing task rejects its own caller and does not block the queue.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every previously queued task has settled.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  /** Whether a task is running or queued. */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending--;
  }
}

/**
 * Runs tasks one at a time in submission order. Editor hosts generally
 * require their API to be driven from a single thread; every action goes
 * through one of these regardless of how many connections are open.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  get pending(): number {
    return this.pendingCount;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pendingCount += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  private settle(): void {
    this.pendingCount -= 1;
  }
}

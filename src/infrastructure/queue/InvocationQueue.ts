/**
 * FIFO queue that runs one task at a time.
 * Each task starts only after the previous one has settled.
 */
export class InvocationQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // Keep the chain alive whether the task resolves or rejects
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

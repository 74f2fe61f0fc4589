/**
 * FIFO executor: tasks run one at a time, in submission order.
 *
 * Every mutation of coordinator state goes through a single instance of this,
 * so a capture attempt and a safe-zone escape for the same prey can never
 * interleave. A failing task rejects its own promise only; the queue moves on.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

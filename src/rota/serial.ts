/**
 * Runs enqueued tasks one at a time in submission order. A rejected task does
 * not poison the queue; its error is returned to the caller that enqueued it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  enqueue<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

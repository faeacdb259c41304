/**
 * Runs tasks one at a time in submission order. A failing task does not block the ones behind it.
 */
export class RunQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    // The caller observes the rejection through `result`; the chain only needs to keep going.
    this.tail = result.catch(() => undefined);
    return result;
  }

  size(): number {
    return this.pending;
  }
}

/**
 * Runs async tasks one at a time in submission order. Used to keep
 * check-then-write sequences against the shared connection from
 * interleaving.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(() => task());
    // the caller observes failures through `result`; the chain only needs
    // to know the task settled
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

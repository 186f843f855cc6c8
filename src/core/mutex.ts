/**
 * Promise-chain mutex. Tasks run one at a time in call order; a failed task
 * releases the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    return previous.then(task).finally(() => {
      this.pending--;
      release();
    });
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}

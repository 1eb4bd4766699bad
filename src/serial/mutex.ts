/**
 * FIFO lock over a promise chain. Tasks run one at a time in the order
 * they were submitted; a rejected task does not poison the chain.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => {
        this.waiting--;
      },
      () => {
        this.waiting--;
      }
    );
    return run;
  }

  isLocked(): boolean {
    return this.waiting > 0;
  }
}

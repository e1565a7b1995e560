/**
 * Promise-chain mutex. Callers run strictly one after another in the order
 * they asked for the lock; a failing holder releases it like a succeeding one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.holders++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  private release(): void {
    this.holders--;
  }
}
